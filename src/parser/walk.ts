import { Module, Node, Statement } from './ast';

export type Scope = 'module' | 'class' | 'function';

export interface Visit {
  node: Node;
  /** Kind of the nearest enclosing module, class or function. */
  scope: Scope;
}

function children(node: Node): Statement[] {
  switch (node.kind) {
    case 'Module':
    case 'FunctionDef':
    case 'ClassDef':
    case 'Compound':
      return node.body;
    case 'Assign':
    case 'Other':
      return [];
  }
}

function scopeWithin(visit: Visit): Scope {
  switch (visit.node.kind) {
    case 'FunctionDef':
      return 'function';
    case 'ClassDef':
      return 'class';
    default:
      return visit.scope;
  }
}

/**
 * Breadth-first traversal: the module first, then every statement one level
 * down, and so on. Siblings keep source order.
 */
export function* walk(module: Module): Generator<Visit> {
  const queue: Visit[] = [{ node: module, scope: 'module' }];
  for (let i = 0; i < queue.length; i++) {
    const visit = queue[i];
    yield visit;
    const scope = scopeWithin(visit);
    for (const child of children(visit.node)) {
      queue.push({ node: child, scope });
    }
  }
}
