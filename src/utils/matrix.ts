/**
 * Matrix utilities
 * Row-major 3x3 matrices used by the color-space transforms
 */

export type Vector3 = readonly [number, number, number];

export type Matrix3x3 = readonly [Vector3, Vector3, Vector3];

/**
 * Multiply a 3x3 matrix with a column vector
 */
export function multiplyMatrixVector(matrix: Matrix3x3, vector: Vector3): [number, number, number] {
  const [v1, v2, v3] = vector;
  return [
    matrix[0][0] * v1 + matrix[0][1] * v2 + matrix[0][2] * v3,
    matrix[1][0] * v1 + matrix[1][1] * v2 + matrix[1][2] * v3,
    matrix[2][0] * v1 + matrix[2][1] * v2 + matrix[2][2] * v3,
  ];
}
