/**
 * Minimum-cost perfect matching on a square cost matrix
 * (Kuhn-Munkres / Hungarian algorithm, O(n^3)).
 *
 * Rows are added one at a time; each addition grows a shortest augmenting
 * path using row/column potentials, so reduced costs stay non-negative and
 * the matching stays optimal after every step.
 */

function validate(costMatrix: readonly (readonly number[])[]): void {
  const n = costMatrix.length;
  costMatrix.forEach((row, i) => {
    if (row.length !== n) {
      throw new RangeError(`cost matrix must be square: row ${i} has ${row.length} columns, expected ${n}`);
    }
    row.forEach((cost, j) => {
      if (!Number.isFinite(cost) || cost < 0) {
        throw new RangeError(`cost matrix entry [${i}][${j}] must be a finite non-negative number, got ${cost}`);
      }
    });
  });
}

/**
 * Solve the assignment problem.
 * @returns for each row, the column assigned to it
 */
export function solveAssignment(costMatrix: readonly (readonly number[])[]): number[] {
  validate(costMatrix);
  const n = costMatrix.length;
  if (n === 0) return [];

  // 1-based; index 0 is the virtual column the augmenting path starts from.
  const rowPotential = new Array<number>(n + 1).fill(0);
  const colPotential = new Array<number>(n + 1).fill(0);
  const rowOfCol = new Array<number>(n + 1).fill(0);
  const prevCol = new Array<number>(n + 1).fill(0);

  for (let row = 1; row <= n; row++) {
    rowOfCol[0] = row;
    const minReduced = new Array<number>(n + 1).fill(Infinity);
    const used = new Array<boolean>(n + 1).fill(false);
    let col = 0;

    // Dijkstra-like growth until a free column is reached
    do {
      used[col] = true;
      const r = rowOfCol[col];
      let delta = Infinity;
      let next = 0;

      for (let j = 1; j <= n; j++) {
        if (used[j]) continue;
        const reduced = costMatrix[r - 1][j - 1] - rowPotential[r] - colPotential[j];
        if (reduced < minReduced[j]) {
          minReduced[j] = reduced;
          prevCol[j] = col;
        }
        if (minReduced[j] < delta) {
          delta = minReduced[j];
          next = j;
        }
      }

      for (let j = 0; j <= n; j++) {
        if (used[j]) {
          rowPotential[rowOfCol[j]] += delta;
          colPotential[j] -= delta;
        } else {
          minReduced[j] -= delta;
        }
      }

      col = next;
    } while (rowOfCol[col] !== 0);

    // Flip the path back to the virtual column
    do {
      const prev = prevCol[col];
      rowOfCol[col] = rowOfCol[prev];
      col = prev;
    } while (col !== 0);
  }

  const assignment = new Array<number>(n).fill(-1);
  for (let j = 1; j <= n; j++) {
    assignment[rowOfCol[j] - 1] = j - 1;
  }
  return assignment;
}

/**
 * Total cost of an assignment (column per row).
 */
export function assignmentCost(
  costMatrix: readonly (readonly number[])[],
  assignment: readonly number[],
): number {
  let total = 0;
  assignment.forEach((col, row) => {
    total += costMatrix[row][col];
  });
  return total;
}
