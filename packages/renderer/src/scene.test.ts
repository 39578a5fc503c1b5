/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene registry tests against the in-process GPU fake
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { exportSceneObject, type BillboardPayload, type LinePayload, type MeshPayload } from '@partview/geometry';
import { SceneRegistry } from './scene.js';
import { PipelineFactory } from './pipeline.js';
import { SceneError } from './errors.js';
import { createTestContext, flush, FakeRasterizer, type FakeDevice } from '../test/fake-gpu.js';

function meshPayload(id: string, alpha = 1, z = 0): MeshPayload {
  return {
    id,
    vertices: new Float32Array([0, 0, z, 2, 0, z, 0, 2, z]),
    indices: new Uint16Array([0, 1, 2]),
    colors: new Float32Array([1, 0, 0, alpha]),
    singleColor: true,
  };
}

function vertexColoredPayload(id: string): MeshPayload {
  return {
    id,
    vertices: new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0]),
    indices: new Uint16Array([0, 1, 2]),
    colors: new Float32Array([1, 0, 0, 1, 0, 1, 0, 1, 0, 0, 1, 1]),
    singleColor: false,
  };
}

function linePayload(id: string): LinePayload {
  const exported = exportSceneObject({
    kind: 'lines',
    id,
    vertices: [
      [0, 0, 0],
      [4, 0, 0],
    ],
    colors: [[0, 0, 1, 1]],
    thicknesses: [1],
    fades: [0],
  });
  if (exported.kind !== 'lines') throw new Error('expected line payload');
  return exported.payload;
}

function buffersOf(device: FakeDevice, prefix: string) {
  return device.buffers.filter((b) => b.label?.startsWith(prefix));
}

describe('SceneRegistry', () => {
  let device: FakeDevice;
  let factory: PipelineFactory;
  let rasterizer: FakeRasterizer;
  let onChange: ReturnType<typeof vi.fn>;
  let scene: SceneRegistry;

  beforeEach(async () => {
    const ctx = await createTestContext();
    device = ctx.device;
    factory = new PipelineFactory(ctx.context, 4);
    rasterizer = new FakeRasterizer(64, 32);
    onChange = vi.fn();
    scene = new SceneRegistry(
      {
        device: device.asGPUDevice(),
        factory,
        lightBuffer: device.asGPUDevice().createBuffer({ label: 'Light', size: 32, usage: 0x40 }),
        rasterizer,
      },
      { onChange }
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('meshes', () => {
    it('should register a mesh once its pipeline is ready', async () => {
      await scene.addMesh(meshPayload('bracket'));

      const [mesh] = scene.getMeshes();
      expect(mesh.id).toBe('bracket');
      expect(mesh.transparent).toBe(false);
      expect(mesh.indexCount).toBe(3);
      expect(mesh.anchor).toEqual({ x: 1, y: 1, z: 0 });
      expect(mesh.pipeline?.label).toBe('mesh-uniform/opaque/4x Pipeline');
      expect(onChange).toHaveBeenCalledWith('mesh');
    });

    it('should pick the transparent vertex-color pipeline from vertex alphas', async () => {
      const payload = vertexColoredPayload('gradient');
      payload.colors[11] = 0.5;
      await scene.addMesh(payload);

      const [mesh] = scene.getMeshes();
      expect(mesh.singleColor).toBe(false);
      expect(mesh.transparent).toBe(true);
      expect(mesh.pipeline?.label).toBe('mesh-vertex-color/transparent/4x Pipeline');
    });

    it('should write the uniform color, or white for vertex-colored meshes', async () => {
      await scene.addMesh(meshPayload('red', 0.25));
      await scene.addMesh(vertexColoredPayload('colored'));

      expect(device.writesTo('Mesh "red" Color')).toEqual([new Float32Array([1, 0, 0, 0.25])]);
      expect(device.writesTo('Mesh "colored" Color')).toEqual([new Float32Array([1, 1, 1, 1])]);
    });

    it('should throw synchronously for a duplicate id', async () => {
      await scene.addMesh(meshPayload('a'));
      expect(() => scene.addMesh(meshPayload('a'))).toThrow(SceneError);
    });

    it('should throw for an id whose add is still pending', () => {
      device.deferPipelines = true;
      void scene.addMesh(meshPayload('a'));
      expect(() => scene.addMesh(meshPayload('a'))).toThrow('A mesh object with id "a" already exists');
    });

    it('should allow the same id in different collections', async () => {
      await scene.addMesh(meshPayload('shared'));
      await scene.addLines(linePayload('shared'));
      expect(scene.getMeshes()).toHaveLength(1);
      expect(scene.getLines()).toHaveLength(1);
    });

    it('should remove by id or by insertion index', async () => {
      await scene.addMesh(meshPayload('a'));
      await scene.addMesh(meshPayload('b'));
      await scene.addMesh(meshPayload('c'));

      scene.removeMesh('b');
      expect(scene.getMeshes().map((m) => m.id)).toEqual(['a', 'c']);
      scene.removeMesh(0);
      expect(scene.getMeshes().map((m) => m.id)).toEqual(['c']);
      expect(buffersOf(device, 'Mesh "a"').every((b) => b.destroyed)).toBe(true);
      expect(buffersOf(device, 'Mesh "c"').some((b) => b.destroyed)).toBe(false);
    });

    it('should warn and do nothing for an unknown key', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      await scene.addMesh(meshPayload('a'));
      onChange.mockClear();

      scene.removeMesh('missing');
      scene.removeMesh(3);
      scene.removeMesh(-1);

      expect(scene.getMeshes()).toHaveLength(1);
      expect(onChange).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledTimes(3);
      expect(warn).toHaveBeenCalledWith('[Scene] removeMesh No mesh object for key "missing"');
      expect(warn).toHaveBeenCalledWith('[Scene] removeMesh No mesh object for key 3');
    });

    it('should cancel a pending add on remove and release what it built', async () => {
      device.deferPipelines = true;
      const adding = scene.addMesh(meshPayload('late'));
      expect(scene.getPendingCount()).toBe(1);

      scene.removeMesh('late');
      expect(scene.getPendingCount()).toBe(0);

      device.resolvePipelines();
      await adding;

      expect(scene.getMeshes()).toHaveLength(0);
      expect(buffersOf(device, 'Mesh "late"').every((b) => b.destroyed)).toBe(true);
      expect(onChange).not.toHaveBeenCalled();
    });

    it('should let a cancelled id be added again', async () => {
      device.deferPipelines = true;
      const first = scene.addMesh(meshPayload('again', 1, 0));
      scene.removeMesh('again');
      const second = scene.addMesh(meshPayload('again', 1, 5));

      device.resolvePipelines();
      await Promise.all([first, second]);

      const meshes = scene.getMeshes();
      expect(meshes).toHaveLength(1);
      expect(meshes[0].anchor.z).toBe(5);
    });

    it('should clear live meshes and cancel pending ones', async () => {
      await scene.addMesh(meshPayload('live'));
      device.deferPipelines = true;
      const pending = scene.addMesh(meshPayload('pending'));

      scene.clearAllMeshes();
      device.resolvePipelines();
      await pending;

      expect(scene.getMeshes()).toHaveLength(0);
      expect(scene.getPendingCount()).toBe(0);
      expect(buffersOf(device, 'Mesh "').every((b) => b.destroyed)).toBe(true);
    });

    it('should release buffers and reject when the pipeline fails', async () => {
      device.pipelineError = new Error('compile failed');
      await expect(scene.addMesh(meshPayload('broken'))).rejects.toThrow('compile failed');

      expect(scene.getPendingCount()).toBe(0);
      expect(scene.getMeshes()).toHaveLength(0);
      expect(buffersOf(device, 'Mesh "broken"').every((b) => b.destroyed)).toBe(true);
    });

    it('should reassign the pipeline when the sample count changed mid-add', async () => {
      device.deferPipelines = true;
      const adding = scene.addMesh(meshPayload('msaa'));
      factory.setSampleCount(1);

      device.resolvePipelines();
      await adding;
      expect(scene.getMeshes()[0].pipeline).toBeNull();

      device.resolvePipelines();
      await flush();
      expect(scene.getMeshes()[0].pipeline?.label).toBe('mesh-uniform/opaque/1x Pipeline');
    });
  });

  describe('changeMeshColor', () => {
    it('should rewrite the color uniform in place', async () => {
      await scene.addMesh(meshPayload('a'));
      const pipeline = scene.getMeshes()[0].pipeline;

      await scene.changeMeshColor('a', [0, 1, 0, 1]);

      expect(device.writesTo('Mesh "a" Color').at(-1)).toEqual(new Float32Array([0, 1, 0, 1]));
      expect(scene.getMeshes()[0].pipeline).toBe(pipeline);
    });

    it('should swap to the transparent pipeline when alpha drops below 1', async () => {
      await scene.addMesh(meshPayload('a'));
      device.deferPipelines = true;

      const changing = scene.changeMeshColor(0, [1, 0, 0, 0.5]);
      const mesh = scene.getMeshes()[0];
      expect(mesh.transparent).toBe(true);
      expect(mesh.pipeline).toBeNull();

      device.resolvePipelines();
      await changing;
      expect(mesh.pipeline?.label).toBe('mesh-uniform/transparent/4x Pipeline');
    });

    it('should ignore vertex-colored meshes', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      await scene.addMesh(vertexColoredPayload('v'));

      await scene.changeMeshColor('v', [0, 0, 0, 1]);

      expect(device.writesTo('Mesh "v" Color')).toHaveLength(1);
      expect(warn).toHaveBeenCalledWith('[Scene] changeMeshColor "v" Mesh uses vertex colors, color change ignored');
    });

    it('should warn for an unknown key', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      await scene.changeMeshColor('nothing', [0, 0, 0, 1]);
      expect(warn).toHaveBeenCalledWith('[Scene] changeMeshColor No mesh for key "nothing"');
    });
  });

  describe('lines', () => {
    it('should upload one buffer per attribute', async () => {
      await scene.addLines(linePayload('edge'));

      const [lines] = scene.getLines();
      expect(lines.vertexBuffers).toHaveLength(6);
      expect(lines.pipeline?.label).toBe('lines/transparent/4x Pipeline');
      expect(lines.bounds).toEqual({ min: { x: 0, y: 0, z: 0 }, max: { x: 4, y: 0, z: 0 } });
      expect(lines.anchor).toEqual({ x: 2, y: 0, z: 0 });
    });

    it('should remove and clear', async () => {
      await scene.addLines(linePayload('a'));
      await scene.addLines(linePayload('b'));
      scene.removeLines('a');
      expect(scene.getLines().map((l) => l.id)).toEqual(['b']);
      scene.clearAllLines();
      expect(scene.getLines()).toHaveLength(0);
      expect(onChange).toHaveBeenLastCalledWith('lines');
    });
  });

  describe('text billboards', () => {
    const label: BillboardPayload = {
      id: 'tag',
      text: 'M6 bolt',
      position: [1, 2, 3],
      backgroundColor: [0, 0, 0, 1],
      textColor: [1, 1, 1, 1],
    };

    it('should rasterize the label and anchor it at its position', async () => {
      await scene.addTextBillboard(label);

      const [billboard] = scene.getBillboards();
      expect(rasterizer.labels).toEqual(['M6 bolt']);
      expect(billboard.anchor).toEqual({ x: 1, y: 2, z: 3 });
      expect(billboard.pipeline?.label).toBe('billboard/transparent/4x Pipeline');
    });

    it('should destroy the label texture on remove', async () => {
      await scene.addTextBillboard(label);
      const texture = device.textures.find((t) => t.label === 'Label "M6 bolt" Texture');

      scene.removeTextBillboard('tag');
      expect(texture?.destroyed).toBe(true);
      expect(scene.getBillboards()).toHaveLength(0);
    });

    it('should clear all billboards', async () => {
      await scene.addTextBillboard(label);
      await scene.addTextBillboard({ ...label, id: 'tag-2' });
      scene.clearAllTextBillboards();
      expect(scene.getBillboards()).toHaveLength(0);
    });
  });

  describe('bounds', () => {
    it('should fall back to a unit sphere when empty', () => {
      expect(scene.isEmpty()).toBe(true);
      expect(scene.getBoundingSphere()).toEqual({ center: { x: 0, y: 0, z: 0 }, radius: 1 });
    });

    it('should cover every live object', async () => {
      await scene.addMesh(meshPayload('a', 1, 0));
      await scene.addLines(linePayload('l'));
      await scene.addTextBillboard({
        id: 't',
        text: 'x',
        position: [0, 0, 3],
        backgroundColor: [0, 0, 0, 1],
        textColor: [1, 1, 1, 1],
      });

      expect(scene.getBounds()).toEqual({ min: { x: 0, y: 0, z: 0 }, max: { x: 4, y: 2, z: 3 } });
    });
  });

  describe('clear and dispose', () => {
    it('should empty every collection', async () => {
      await scene.addMesh(meshPayload('a'));
      await scene.addLines(linePayload('b'));
      scene.clear();
      expect(scene.isEmpty()).toBe(true);
    });

    it('should stop notifying after dispose', async () => {
      await scene.addMesh(meshPayload('a'));
      onChange.mockClear();
      scene.dispose();
      expect(onChange).not.toHaveBeenCalled();
      expect(scene.isEmpty()).toBe(true);
    });
  });
});
