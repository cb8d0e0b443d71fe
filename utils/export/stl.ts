/**
 * STL EXPORT
 *
 * Solid (jscad Geom3) → three BufferGeometry → binary STL, and a zip bundle of
 * every generated part.
 */

import { geometries } from '@jscad/modeling';
import type { Geom3 } from '@jscad/modeling/src/geometries/types';
import JSZip from 'jszip';
import * as THREE from 'three';
import { STLExporter } from 'three/addons/exporters/STLExporter.js';
import { mergeVertices } from 'three-stdlib';

export interface ExportedPart {
  name: string;       // File name inside the bundle, e.g. "right.stl"
  data: Uint8Array;
  triangles: number;
}

/**
 * Fan-triangulates every polygon (transforms already applied) and welds shared vertices.
 */
export const geom3ToBufferGeometry = (solid: Geom3): THREE.BufferGeometry => {
  const vertices: number[] = [];
  const indices: number[] = [];
  let vertexIndex = 0;

  for (const polygon of geometries.geom3.toPolygons(solid)) {
    const points = polygon.vertices;
    if (points.length < 3) continue;

    for (const [x, y, z] of points) vertices.push(x, y, z);
    for (let i = 1; i < points.length - 1; i++) {
      indices.push(vertexIndex, vertexIndex + i, vertexIndex + i + 1);
    }
    vertexIndex += points.length;
  }

  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.Float32BufferAttribute(vertices, 3));
  geometry.setIndex(indices);

  const welded = mergeVertices(geometry, 1e-4);
  welded.computeVertexNormals();
  return welded;
};

export const triangleCount = (geometry: THREE.BufferGeometry): number => {
  const index = geometry.getIndex();
  return index ? index.count / 3 : geometry.getAttribute('position').count / 3;
};

export const geometryToStl = (geometry: THREE.BufferGeometry): Uint8Array => {
  const exporter = new STLExporter();
  // Identity transform, no scene graph
  const mesh = new THREE.Mesh(geometry);
  mesh.updateMatrixWorld(true);

  const result = exporter.parse(mesh, { binary: true });
  if (result instanceof DataView) {
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength);
  }
  return new TextEncoder().encode(result);
};

export const exportPart = (name: string, solid: Geom3): ExportedPart => {
  const geometry = geom3ToBufferGeometry(solid);
  return { name, data: geometryToStl(geometry), triangles: triangleCount(geometry) };
};

export const bundleParts = async (parts: readonly ExportedPart[]): Promise<Uint8Array> => {
  const zip = new JSZip();
  for (const part of parts) zip.file(part.name, part.data);
  return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
};
