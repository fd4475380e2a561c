import {
  SizeDrivenPopulator,
  createRandomizationContext,
  type FieldRef,
  type GenerationParametersInput,
  type RandomizationContext,
  type RandomizationContextOptions,
} from '../../src/index.js';

/**
 * Self-referential fixture type: parent and children point back to TreeNode.
 */
export class TreeNode {
  parent: TreeNode | null = null;
  children: TreeNode[] = [];

  constructor(public readonly id: number) {}
}

const PARENT: FieldRef = { name: 'parent', declaringType: TreeNode };
const CHILDREN: FieldRef = { name: 'children', declaringType: TreeNode };

class ChildrenPopulator extends SizeDrivenPopulator {
  populate(next: () => TreeNode): TreeNode[] {
    return Array.from({ length: this.getRandomSize() }, () => next());
  }
}

/**
 * Minimal population engine driving a RandomizationContext the way a
 * reflective engine would: push/pop around every field, depth checks
 * before descending, fresh build until the pool is full, reuse after.
 */
export class TreeNodeGenerator {
  private nextId = 0;
  private readonly children: ChildrenPopulator;

  constructor(private readonly context: RandomizationContext<TreeNode>) {
    this.children = new ChildrenPopulator(context.parameters);
  }

  generate(): TreeNode {
    const root = this.nextNode();
    const completed = this.context.complete();
    if (completed !== root) {
      throw new Error('root object differs from the first built node');
    }
    return root;
  }

  private nextNode(): TreeNode {
    if (this.context.hasAlreadyFullyRandomized(TreeNode)) {
      const reused = this.context.pickPooledInstance(TreeNode);
      if (!(reused instanceof TreeNode)) {
        throw new Error('TreeNode pool holds a foreign instance');
      }
      this.context.registerUsage(TreeNode, reused);
      return reused;
    }

    const node = new TreeNode(this.nextId++);
    this.context.setRootIfUnset(node);
    this.context.registerBuiltInstance(TreeNode, node);
    node.parent = this.populateParent(node);
    node.children = this.populateChildren(node);
    return node;
  }

  private populateParent(owner: TreeNode): TreeNode | null {
    this.context.pushFrame(owner, PARENT);
    try {
      if (this.context.exceedsMaxDepth()) {
        return null;
      }
      if (this.context.isAtDeepestLevelAndShouldUseEmpty()) {
        return new TreeNode(this.nextId++);
      }
      return this.nextNode();
    } finally {
      this.context.popFrame();
    }
  }

  private populateChildren(owner: TreeNode): TreeNode[] {
    this.context.pushFrame(owner, CHILDREN);
    try {
      if (
        this.context.exceedsMaxDepth() ||
        this.context.isAtDeepestLevelAndShouldUseEmpty()
      ) {
        return [];
      }
      return this.children.populate(() => this.nextNode());
    } finally {
      this.context.popFrame();
    }
  }
}

export function generateTree(
  parameters: GenerationParametersInput,
  options?: RandomizationContextOptions
): { root: TreeNode; context: RandomizationContext<TreeNode> } {
  const context = createRandomizationContext<TreeNode>(
    TreeNode,
    parameters,
    options
  );
  const root = new TreeNodeGenerator(context).generate();
  return { root, context };
}

/** Every node reachable from `root` through parent and children links. */
export function collectReachable(root: TreeNode): Set<TreeNode> {
  const seen = new Set<TreeNode>();
  const pending: TreeNode[] = [root];
  for (let node = pending.pop(); node; node = pending.pop()) {
    if (seen.has(node)) continue;
    seen.add(node);
    if (node.parent) pending.push(node.parent);
    pending.push(...node.children);
  }
  return seen;
}
