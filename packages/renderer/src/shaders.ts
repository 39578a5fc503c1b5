/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * WGSL sources. Group 0 is always the frame uniform (projection + view);
 * group 1 is per pipeline kind.
 */

import { BILLBOARD_CONSTANTS } from './constants.js';

const FRAME_UNIFORMS = /* wgsl */ `
  struct Frame {
    projection: mat4x4<f32>,
    view: mat4x4<f32>,
  }
  @group(0) @binding(0) var<uniform> frame: Frame;
`;

/**
 * Anti-aliased grid lines on a quad, after Ben Golus' "pristine grid".
 */
export const GRID_SHADER = /* wgsl */ `
  ${FRAME_UNIFORMS}

  struct GridArgs {
    lineColor: vec4<f32>,
    baseColor: vec4<f32>,
    lineWidth: vec2<f32>,
    spacing: f32,
  }
  @group(1) @binding(0) var<uniform> grid: GridArgs;

  struct VertexInput {
    @location(0) position: vec3<f32>,
    @location(1) uv: vec2<f32>,
  }

  struct VertexOutput {
    @builtin(position) position: vec4<f32>,
    @location(0) uv: vec2<f32>,
  }

  fn pristineGrid(uv: vec2<f32>, lineWidth: vec2<f32>) -> f32 {
    let uvDDXY = vec4<f32>(dpdx(uv), dpdy(uv));
    let uvDeriv = vec2<f32>(length(uvDDXY.xz), length(uvDDXY.yw));
    let invertLine = lineWidth > vec2<f32>(0.5);
    let targetWidth = select(lineWidth, 1.0 - lineWidth, invertLine);
    let drawWidth = clamp(targetWidth, uvDeriv, vec2<f32>(0.5));
    let lineAA = uvDeriv * 1.5;
    var gridUV = abs(fract(uv) * 2.0 - 1.0);
    gridUV = select(1.0 - gridUV, gridUV, invertLine);
    var grid2 = smoothstep(drawWidth + lineAA, drawWidth - lineAA, gridUV);
    grid2 *= saturate(targetWidth / drawWidth);
    grid2 = mix(grid2, targetWidth, saturate(uvDeriv * 2.0 - 1.0));
    grid2 = select(grid2, 1.0 - grid2, invertLine);
    return mix(grid2.x, 1.0, grid2.y);
  }

  @vertex
  fn vs_main(input: VertexInput) -> VertexOutput {
    var output: VertexOutput;
    output.position = frame.projection * frame.view * vec4<f32>(input.position, 1.0);
    // Center the 0..100 UV range on the origin
    output.uv = input.uv - vec2<f32>(50.0, 50.0);
    return output;
  }

  @fragment
  fn fs_main(input: VertexOutput) -> @location(0) vec4<f32> {
    let line = pristineGrid(input.uv * grid.spacing, grid.lineWidth);
    return mix(grid.baseColor, grid.lineColor, line);
  }
`;

/**
 * Blinn-Phong shading in view space with flat normals from screen-space
 * derivatives. Two vertex entry points: one reads the mesh color uniform,
 * the other a per-vertex color attribute.
 */
export const MESH_SHADER = /* wgsl */ `
  ${FRAME_UNIFORMS}

  struct Light {
    direction: vec3<f32>,
    ambient: f32,
    specularPower: f32,
  }
  @group(1) @binding(0) var<uniform> light: Light;

  struct MeshColor {
    color: vec4<f32>,
  }
  @group(1) @binding(1) var<uniform> mesh: MeshColor;

  struct VertexOutput {
    @builtin(position) position: vec4<f32>,
    @location(0) viewPos: vec3<f32>,
    @location(1) @interpolate(flat) color: vec4<f32>,
  }

  fn project(position: vec3<f32>, color: vec4<f32>) -> VertexOutput {
    var output: VertexOutput;
    let viewPos = frame.view * vec4<f32>(position, 1.0);
    output.position = frame.projection * viewPos;
    output.viewPos = viewPos.xyz;
    output.color = color;
    return output;
  }

  @vertex
  fn vs_uniform(@location(0) position: vec3<f32>) -> VertexOutput {
    return project(position, mesh.color);
  }

  @vertex
  fn vs_vertex_color(@location(0) position: vec3<f32>, @location(1) color: vec4<f32>) -> VertexOutput {
    return project(position, color);
  }

  @fragment
  fn fs_main(input: VertexOutput) -> @location(0) vec4<f32> {
    // Framebuffer y grows downwards, so this order faces the viewer
    let normal = normalize(cross(dpdy(input.viewPos), dpdx(input.viewPos)));
    let toLight = normalize(-(frame.view * vec4<f32>(light.direction, 0.0)).xyz);
    let toViewer = normalize(-input.viewPos);
    let halfway = normalize(toLight + toViewer);

    let diffuse = max(dot(normal, toLight), 0.0);
    let specular = pow(max(dot(normal, halfway), 0.0), light.specularPower);

    let rgb = input.color.rgb * (light.ambient + diffuse) + vec3<f32>(specular);
    return vec4<f32>(rgb, input.color.a);
  }
`;

/**
 * Stadium strips: every vertex carries its segment's start and end points
 * and is pushed out in view space by thickness along the UV.
 */
export const BILLBOARD_LINE_SHADER = /* wgsl */ `
  ${FRAME_UNIFORMS}

  struct VertexInput {
    @location(0) position: vec3<f32>,
    @location(1) color: vec4<f32>,
    @location(2) thickness: f32,
    @location(3) uv: vec2<f32>,
    @location(4) endPosition: vec3<f32>,
    @location(5) fade: f32,
  }

  struct VertexOutput {
    @builtin(position) position: vec4<f32>,
    @location(0) color: vec4<f32>,
    @location(1) across: f32,
    @location(2) fade: f32,
  }

  @vertex
  fn vs_main(input: VertexInput) -> VertexOutput {
    var output: VertexOutput;
    let viewStart = frame.view * vec4<f32>(input.position, 1.0);
    let viewEnd = frame.view * vec4<f32>(input.endPosition, 1.0);

    let delta = viewEnd.xy - viewStart.xy;
    let tangent = delta / max(length(delta), 1e-6);
    let normal = vec2<f32>(-tangent.y, tangent.x);

    // uv.x outside 0..1 belongs to a cap and pushes along the tangent
    let along = clamp(input.uv.x, 0.0, 1.0);
    let capOffset = input.uv.x - along;
    let center = mix(viewStart, viewEnd, vec4<f32>(along));
    let xy = center.xy + normal * (input.thickness * input.uv.y) + tangent * (input.thickness * capOffset);

    output.position = frame.projection * vec4<f32>(xy, center.z, center.w);
    output.color = input.color;
    output.across = input.uv.y;
    output.fade = input.fade;
    return output;
  }

  @fragment
  fn fs_main(input: VertexOutput) -> @location(0) vec4<f32> {
    var alpha = input.color.a;
    if (input.fade > 0.0) {
      alpha *= clamp(1.0 - abs(input.across) / (0.5 * input.fade), 0.0, 1.0);
    }
    return vec4<f32>(input.color.rgb, alpha);
  }
`;

/**
 * Camera-facing textured quad. The four vertices share the anchor position;
 * the corner comes from the UV and the half size in world units.
 */
export const BILLBOARD_SHADER = /* wgsl */ `
  ${FRAME_UNIFORMS}

  @group(1) @binding(0) var labelSampler: sampler;
  @group(1) @binding(1) var labelTexture: texture_2d<f32>;

  struct VertexInput {
    @location(0) position: vec3<f32>,
    @location(1) uv: vec2<f32>,
    @location(2) halfSize: vec2<f32>,
  }

  struct VertexOutput {
    @builtin(position) position: vec4<f32>,
    @location(0) uv: vec2<f32>,
  }

  @vertex
  fn vs_main(input: VertexInput) -> VertexOutput {
    var output: VertexOutput;
    let offset = (input.uv - vec2<f32>(0.5)) * 2.0 * input.halfSize;
    // Camera right and up are the first two rows of the view rotation
    let right = vec3<f32>(frame.view[0][0], frame.view[1][0], frame.view[2][0]);
    let up = vec3<f32>(frame.view[0][1], frame.view[1][1], frame.view[2][1]);
    let world = input.position + right * offset.x + up * offset.y;
    output.position = frame.projection * frame.view * vec4<f32>(world, 1.0);
    output.uv = input.uv;
    return output;
  }

  @fragment
  fn fs_main(input: VertexOutput) -> @location(0) vec4<f32> {
    let color = textureSample(labelTexture, labelSampler, input.uv);
    if (color.a < ${BILLBOARD_CONSTANTS.ALPHA_CUTOFF.toFixed(2)}) {
      discard;
    }
    return color;
  }
`;
