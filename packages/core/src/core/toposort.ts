/**
 * Topological sort for hierarchy files: parents before children.
 *
 * Kahn's algorithm. Dependencies outside the input set are ignored here and
 * reported later by registration (ERR_UNKNOWN_PARENT). When several items are
 * ready at once they are emitted in input order, so a file already listed
 * parents-first keeps its order.
 */

/**
 * Thrown when the items' dependencies form a cycle.
 */
export class CycleError extends Error {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`);
    this.name = 'CycleError';
    this.cycle = cycle;
  }
}

export interface ToposortItem {
  id: string;
  dependencies: string[];
}

/**
 * @returns IDs in dependency order (dependencies first)
 * @throws CycleError if a dependency cycle exists
 */
export function toposort(items: ToposortItem[]): string[] {
  const knownIds = new Set(items.map(item => item.id));
  const successors = new Map<string, string[]>();
  const inDegree = new Map<string, number>();

  for (const item of items) {
    successors.set(item.id, []);
    inDegree.set(item.id, 0);
  }

  for (const item of items) {
    for (const dep of item.dependencies) {
      if (!knownIds.has(dep)) continue;
      successors.get(dep)?.push(item.id);
      inDegree.set(item.id, (inDegree.get(item.id) ?? 0) + 1);
    }
  }

  const queue = items.filter(item => inDegree.get(item.id) === 0).map(item => item.id);
  const result: string[] = [];
  let head = 0;

  while (head < queue.length) {
    const current = queue[head++];
    result.push(current);

    for (const successor of successors.get(current) ?? []) {
      const degree = (inDegree.get(successor) ?? 0) - 1;
      inDegree.set(successor, degree);
      if (degree === 0) {
        queue.push(successor);
      }
    }
  }

  if (result.length < items.length) {
    throw new CycleError(findCycle(items, knownIds, new Set(result)));
  }

  return result;
}

/**
 * Walk dependencies of the unprocessed items until one repeats.
 * Returns the cycle ending with a repeat of its first ID.
 */
function findCycle(items: ToposortItem[], knownIds: Set<string>, processed: Set<string>): string[] {
  const deps = new Map<string, string[]>();
  for (const item of items) {
    if (processed.has(item.id)) continue;
    deps.set(item.id, item.dependencies.filter(d => knownIds.has(d) && !processed.has(d)));
  }

  const visited = new Set<string>();
  for (const start of deps.keys()) {
    const path: string[] = [];
    const onPath = new Set<string>();
    let current: string | undefined = start;

    while (current !== undefined && !visited.has(current)) {
      if (onPath.has(current)) {
        return [...path.slice(path.indexOf(current)), current];
      }
      onPath.add(current);
      path.push(current);
      current = deps.get(current)?.[0];
    }

    for (const id of path) visited.add(id);
  }

  return [...deps.keys()];
}
