/**
 * @module math/linear-algebra
 * @description Small dense vector and matrix helpers for descent methods.
 * Vectors are plain number arrays, matrices are arrays of rows.
 */

// ==================== Vector Operations ====================

/**
 * Compute the dot product of two vectors
 */
export function dot(a: number[], b: number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

/**
 * Compute the Euclidean norm (L2 norm) of a vector
 */
export function norm(v: number[]): number {
    return Math.sqrt(squaredNorm(v));
}

/**
 * Compute the squared Euclidean norm of a vector
 */
export function squaredNorm(v: number[]): number {
    let sum = 0;
    for (let i = 0; i < v.length; i++) {
        sum += v[i] * v[i];
    }
    return sum;
}

/**
 * Subtract two vectors: a - b
 */
export function subtract(a: number[], b: number[]): number[] {
    const result: number[] = new Array(a.length);
    for (let i = 0; i < a.length; i++) {
        result[i] = a[i] - b[i];
    }
    return result;
}

/**
 * Scale a vector by a scalar: s * v
 */
export function scale(v: number[], s: number): number[] {
    const result: number[] = new Array(v.length);
    for (let i = 0; i < v.length; i++) {
        result[i] = v[i] * s;
    }
    return result;
}

/**
 * Negate a vector: -v
 */
export function negate(v: number[]): number[] {
    return scale(v, -1);
}

/**
 * Linear combination: a + s * b
 */
export function axpy(a: number[], s: number, b: number[]): number[] {
    const result: number[] = new Array(a.length);
    for (let i = 0; i < a.length; i++) {
        result[i] = a[i] + s * b[i];
    }
    return result;
}

/**
 * True when every entry is a finite number
 */
export function isFiniteVector(v: number[]): boolean {
    return v.every(Number.isFinite);
}

// ==================== Matrix Operations ====================

/**
 * n x n identity matrix
 */
export function identity(n: number): number[][] {
    return Array.from({ length: n }, (_, i) =>
        Array.from({ length: n }, (_, j) => (i === j ? 1 : 0))
    );
}

/**
 * Matrix-vector product: M * v
 */
export function mulMatVec(M: number[][], v: number[]): number[] {
    return M.map(row => dot(row, v));
}

/**
 * Outer product: a * b^T
 */
export function outer(a: number[], b: number[]): number[][] {
    return a.map(ai => b.map(bj => ai * bj));
}

/**
 * Element-wise A + s * B
 */
export function addScaledMatrix(A: number[][], s: number, B: number[][]): number[][] {
    return A.map((row, i) => row.map((aij, j) => aij + s * B[i][j]));
}

/**
 * Largest absolute difference between M and its transpose
 */
export function asymmetry(M: number[][]): number {
    let worst = 0;
    for (let i = 0; i < M.length; i++) {
        for (let j = i + 1; j < M.length; j++) {
            worst = Math.max(worst, Math.abs(M[i][j] - M[j][i]));
        }
    }
    return worst;
}

/**
 * Symmetric part: (M + M^T) / 2
 */
export function symmetrize(M: number[][]): number[][] {
    return M.map((row, i) => row.map((mij, j) => 0.5 * (mij + M[j][i])));
}

/**
 * Solve A x = b by Gaussian elimination with partial pivoting.
 *
 * Returns null when a pivot falls below `pivotTolerance` relative to the
 * largest entry of A (numerically singular).
 */
export function solveLinearSystem(
    A: number[][],
    b: number[],
    pivotTolerance: number = 1e-12
): number[] | null {
    const n = b.length;
    const M = A.map((row, i) => [...row, b[i]]);

    let scaleRef = 0;
    for (const row of A) {
        for (const v of row) scaleRef = Math.max(scaleRef, Math.abs(v));
    }
    if (!(scaleRef > 0) || !Number.isFinite(scaleRef)) return null;

    for (let col = 0; col < n; col++) {
        let pivotRow = col;
        for (let r = col + 1; r < n; r++) {
            if (Math.abs(M[r][col]) > Math.abs(M[pivotRow][col])) pivotRow = r;
        }
        if (Math.abs(M[pivotRow][col]) <= pivotTolerance * scaleRef) return null;
        if (pivotRow !== col) {
            const tmp = M[col];
            M[col] = M[pivotRow];
            M[pivotRow] = tmp;
        }

        for (let r = col + 1; r < n; r++) {
            const factor = M[r][col] / M[col][col];
            for (let c = col; c <= n; c++) {
                M[r][c] -= factor * M[col][c];
            }
        }
    }

    const x: number[] = new Array(n).fill(0);
    for (let r = n - 1; r >= 0; r--) {
        let sum = M[r][n];
        for (let c = r + 1; c < n; c++) {
            sum -= M[r][c] * x[c];
        }
        x[r] = sum / M[r][r];
    }
    return x;
}
