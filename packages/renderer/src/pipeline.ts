/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * WebGPU render pipeline setup
 *
 * Pipelines are created asynchronously and cached by kind, transparency and
 * sample count. The bind group layouts are created once and shared by every
 * pipeline and bind group of the same kind.
 */

import type { RenderContext } from './device.js';
import { PIPELINE_CONSTANTS } from './constants.js';
import { BILLBOARD_LINE_SHADER, BILLBOARD_SHADER, GRID_SHADER, MESH_SHADER } from './shaders.js';
import { createLogger } from './logger.js';

const log = createLogger('Pipeline');

export type PipelineKind = 'grid' | 'mesh-uniform' | 'mesh-vertex-color' | 'lines' | 'billboard';

export interface PipelineRequest {
    kind: PipelineKind;
    /** Transparent pipelines test depth but do not write it */
    transparent: boolean;
}

/**
 * Something that draws with a pipeline filled in later. `null` means not
 * ready; the draw is skipped.
 */
export interface PipelineSlot {
    pipeline: GPURenderPipeline | null;
    pipelineVersion: number;
}

export function pipelineKey(request: PipelineRequest, sampleCount: number): string {
    return `${request.kind}/${request.transparent ? 'transparent' : 'opaque'}/${sampleCount}x`;
}

const BLEND_STATE: GPUBlendState = {
    color: { srcFactor: 'src-alpha', dstFactor: 'one-minus-src-alpha', operation: 'add' },
    alpha: { srcFactor: 'one', dstFactor: 'one-minus-src-alpha', operation: 'add' },
};

/** Stadium strips: one tightly packed buffer per attribute */
const LINE_VERTEX_LAYOUT: GPUVertexBufferLayout[] = [
    { arrayStride: 12, attributes: [{ shaderLocation: 0, offset: 0, format: 'float32x3' }] }, // position
    { arrayStride: 16, attributes: [{ shaderLocation: 1, offset: 0, format: 'float32x4' }] }, // color
    { arrayStride: 4, attributes: [{ shaderLocation: 2, offset: 0, format: 'float32' }] }, // thickness
    { arrayStride: 8, attributes: [{ shaderLocation: 3, offset: 0, format: 'float32x2' }] }, // uv
    { arrayStride: 12, attributes: [{ shaderLocation: 4, offset: 0, format: 'float32x3' }] }, // end position
    { arrayStride: 4, attributes: [{ shaderLocation: 5, offset: 0, format: 'float32' }] }, // fade
];

const POSITION_LAYOUT: GPUVertexBufferLayout = {
    arrayStride: 12,
    attributes: [{ shaderLocation: 0, offset: 0, format: 'float32x3' }],
};

const VERTEX_COLOR_LAYOUT: GPUVertexBufferLayout = {
    arrayStride: 16,
    attributes: [{ shaderLocation: 1, offset: 0, format: 'float32x4' }],
};

const GRID_VERTEX_LAYOUT: GPUVertexBufferLayout = {
    arrayStride: 20, // 3 floats position + 2 floats uv
    attributes: [
        { shaderLocation: 0, offset: 0, format: 'float32x3' },
        { shaderLocation: 1, offset: 12, format: 'float32x2' },
    ],
};

const BILLBOARD_VERTEX_LAYOUT: GPUVertexBufferLayout = {
    arrayStride: 28, // position + uv + half size
    attributes: [
        { shaderLocation: 0, offset: 0, format: 'float32x3' },
        { shaderLocation: 1, offset: 12, format: 'float32x2' },
        { shaderLocation: 2, offset: 20, format: 'float32x2' },
    ],
};

export class PipelineFactory {
    private device: GPUDevice;
    private colorFormat: GPUTextureFormat;
    private sampleCount: number;
    private cache = new Map<string, Promise<GPURenderPipeline>>();
    private modules = new Map<string, GPUShaderModule>();

    /** Group 0: frame uniform */
    readonly frameLayout: GPUBindGroupLayout;
    /** Group 1 for meshes: light uniform + mesh color uniform */
    readonly meshLayout: GPUBindGroupLayout;
    /** Group 1 for the grid: grid arguments */
    readonly gridLayout: GPUBindGroupLayout;
    /** Group 1 for billboards: sampler + label texture */
    readonly billboardLayout: GPUBindGroupLayout;

    constructor(context: RenderContext, sampleCount: number = PIPELINE_CONSTANTS.DEFAULT_SAMPLE_COUNT) {
        this.device = context.getDevice();
        this.colorFormat = context.getColorFormat();
        this.sampleCount = sampleCount;

        this.frameLayout = this.device.createBindGroupLayout({
            label: 'Frame BGL',
            entries: [
                {
                    binding: 0,
                    visibility: GPUShaderStage.VERTEX | GPUShaderStage.FRAGMENT,
                    buffer: { type: 'uniform' },
                },
            ],
        });

        this.meshLayout = this.device.createBindGroupLayout({
            label: 'Mesh BGL',
            entries: [
                { binding: 0, visibility: GPUShaderStage.FRAGMENT, buffer: { type: 'uniform' } }, // light
                { binding: 1, visibility: GPUShaderStage.VERTEX, buffer: { type: 'uniform' } }, // mesh color
            ],
        });

        this.gridLayout = this.device.createBindGroupLayout({
            label: 'Grid BGL',
            entries: [{ binding: 0, visibility: GPUShaderStage.FRAGMENT, buffer: { type: 'uniform' } }],
        });

        this.billboardLayout = this.device.createBindGroupLayout({
            label: 'Billboard BGL',
            entries: [
                { binding: 0, visibility: GPUShaderStage.FRAGMENT, sampler: {} },
                { binding: 1, visibility: GPUShaderStage.FRAGMENT, texture: {} },
            ],
        });
    }

    getSampleCount(): number {
        return this.sampleCount;
    }

    /**
     * Pipelines bake the sample count in, so a change drops the cache.
     * Returns true when the count actually changed.
     */
    setSampleCount(sampleCount: number): boolean {
        if (sampleCount === this.sampleCount) return false;
        this.sampleCount = sampleCount;
        this.cache.clear();
        log.debug(`Sample count set to ${sampleCount}, pipeline cache cleared`);
        return true;
    }

    /**
     * Get or create the pipeline for a request. A failed creation is evicted
     * so the next request retries.
     */
    get(request: PipelineRequest): Promise<GPURenderPipeline> {
        const key = pipelineKey(request, this.sampleCount);
        const cached = this.cache.get(key);
        if (cached) return cached;

        const pending = this.device
            .createRenderPipelineAsync(this.createDescriptor(request, key))
            .catch((error: unknown) => {
                if (this.cache.get(key) === pending) this.cache.delete(key);
                throw error;
            });
        this.cache.set(key, pending);
        return pending;
    }

    /**
     * Refill a slot's pipeline. The slot reads as not ready until the new
     * pipeline arrives; a later `assign` or a bumped `pipelineVersion`
     * discards this one. Never rejects: failures are logged.
     */
    async assign(slot: PipelineSlot, request: PipelineRequest): Promise<void> {
        const version = ++slot.pipelineVersion;
        slot.pipeline = null;
        try {
            const pipeline = await this.get(request);
            if (slot.pipelineVersion === version) {
                slot.pipeline = pipeline;
            }
        } catch (error) {
            log.error(`Failed to create ${request.kind} pipeline`, error, { operation: 'assign' });
        }
    }

    private getModule(label: string, code: string): GPUShaderModule {
        let module = this.modules.get(label);
        if (!module) {
            module = this.device.createShaderModule({ label, code });
            this.modules.set(label, module);
        }
        return module;
    }

    private createDescriptor(request: PipelineRequest, label: string): GPURenderPipelineDescriptor {
        const layout = (group1: GPUBindGroupLayout | null) =>
            this.device.createPipelineLayout({
                bindGroupLayouts: group1 ? [this.frameLayout, group1] : [this.frameLayout],
            });

        let module: GPUShaderModule;
        let vertexEntry = 'vs_main';
        let buffers: GPUVertexBufferLayout[];
        let pipelineLayout: GPUPipelineLayout;
        let cullMode: GPUCullMode = 'none';

        switch (request.kind) {
            case 'grid':
                module = this.getModule('Grid Shader', GRID_SHADER);
                buffers = [GRID_VERTEX_LAYOUT];
                pipelineLayout = layout(this.gridLayout);
                break;
            case 'mesh-uniform':
                module = this.getModule('Mesh Shader', MESH_SHADER);
                vertexEntry = 'vs_uniform';
                buffers = [POSITION_LAYOUT];
                pipelineLayout = layout(this.meshLayout);
                cullMode = 'back';
                break;
            case 'mesh-vertex-color':
                module = this.getModule('Mesh Shader', MESH_SHADER);
                vertexEntry = 'vs_vertex_color';
                buffers = [POSITION_LAYOUT, VERTEX_COLOR_LAYOUT];
                pipelineLayout = layout(this.meshLayout);
                cullMode = 'back';
                break;
            case 'lines':
                module = this.getModule('Billboard Line Shader', BILLBOARD_LINE_SHADER);
                buffers = LINE_VERTEX_LAYOUT;
                pipelineLayout = layout(null);
                break;
            case 'billboard':
                module = this.getModule('Billboard Shader', BILLBOARD_SHADER);
                buffers = [BILLBOARD_VERTEX_LAYOUT];
                pipelineLayout = layout(this.billboardLayout);
                break;
        }

        return {
            label: `${label} Pipeline`,
            layout: pipelineLayout,
            vertex: { module, entryPoint: vertexEntry, buffers },
            fragment: {
                module,
                entryPoint: 'fs_main',
                targets: [{ format: this.colorFormat, blend: BLEND_STATE }],
            },
            primitive: { topology: 'triangle-list', cullMode },
            depthStencil: {
                format: PIPELINE_CONSTANTS.DEPTH_FORMAT,
                depthWriteEnabled: !request.transparent,
                depthCompare: 'less-equal',
            },
            multisample: { count: this.sampleCount },
        };
    }
}
