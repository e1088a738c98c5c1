// A directed graph over names. Iteration order of both the nodes and each
// node's successors is insertion order, which keeps every result below
// deterministic.

type Graph = Map<string, Set<string>>;

interface Component {
  names: string[];
  recursive: boolean;
}

// Returns true if `target` can be reached from `source` over at least one
// edge. `reaches(graph, x, x)` is the recursion check.
const reaches = (graph: Graph, source: string, target: string): boolean => {
  const seen = new Set<string>();
  const stack = Array.from(graph.get(source) || []);
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || seen.has(next)) continue;
    if (next === target) return true;
    seen.add(next);
    (graph.get(next) || new Set()).forEach(x => stack.push(x));
  }
  return false;
};

// Tarjan's algorithm. It completes a component only after every component it
// depends on, so the output is already in topological order: a component
// never has an edge into a component listed after it.
const components = (graph: Graph): Component[] => {
  const order = new Map<string, number>();
  Array.from(graph.keys()).forEach((x, i) => order.set(x, i));

  const index = new Map<string, number>();
  const lowlink = new Map<string, number>();
  const stack: string[] = [];
  const on_stack = new Set<string>();
  const result: Component[] = [];

  const visit = (node: string): void => {
    const n = index.size;
    index.set(node, n);
    lowlink.set(node, n);
    stack.push(node);
    on_stack.add(node);

    for (const next of Array.from(graph.get(node) || [])) {
      if (!graph.has(next)) continue;
      const seen = index.get(next);
      if (seen === undefined) {
        visit(next);
        const low = Math.min(low_of(node), low_of(next));
        lowlink.set(node, low);
      } else if (on_stack.has(next)) {
        lowlink.set(node, Math.min(low_of(node), seen));
      }
    }
    if (low_of(node) !== index.get(node)) return;

    const names: string[] = [];
    for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
      on_stack.delete(top);
      names.push(top);
      if (top === node) break;
    }
    names.sort((a, b) => rank(a) - rank(b));
    const recursive = names.length > 1 || reaches(graph, node, node);
    result.push({names, recursive});
  };

  const low_of = (node: string): number => lowlink.get(node) || 0;
  const rank = (node: string): number => order.get(node) || 0;

  Array.from(graph.keys()).forEach(x => index.has(x) || visit(x));
  return result;
};

const Graph = {components, reaches};

export type {Component};
export {Graph};
