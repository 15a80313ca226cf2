/**
 * Strongly-connected components of the call graph
 *
 * Iterative Tarjan: components come out in reverse topological order, so
 * every component's callees outside it are emitted before it.
 */

type Frame = {
  readonly node: string;
  readonly successors: readonly string[];
  next: number;
};

export const stronglyConnectedComponents = (
  nodes: readonly string[],
  successorsOf: (node: string) => readonly string[]
): readonly (readonly string[])[] => {
  const index = new Map<string, number>();
  const lowlink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];
  let counter = 0;

  const open = (node: string): Frame => {
    index.set(node, counter);
    lowlink.set(node, counter);
    counter++;
    stack.push(node);
    onStack.add(node);
    return { node, successors: successorsOf(node), next: 0 };
  };

  const low = (node: string): number => lowlink.get(node) ?? 0;

  for (const start of nodes) {
    if (index.has(start)) {
      continue;
    }
    const frames: Frame[] = [open(start)];

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (!frame) {
        break;
      }

      const successor = frame.successors[frame.next];
      if (successor !== undefined) {
        frame.next++;
        if (!index.has(successor)) {
          frames.push(open(successor));
        } else if (onStack.has(successor)) {
          lowlink.set(
            frame.node,
            Math.min(low(frame.node), index.get(successor) ?? 0)
          );
        }
        continue;
      }

      frames.pop();
      const parent = frames[frames.length - 1];
      if (parent) {
        lowlink.set(parent.node, Math.min(low(parent.node), low(frame.node)));
      }

      if (low(frame.node) === index.get(frame.node)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member !== undefined) {
            onStack.delete(member);
            component.push(member);
          }
        } while (member !== undefined && member !== frame.node);
        components.push(component.reverse());
      }
    }
  }

  return components;
};
