import { Node, SyntaxKind } from './types';

function visitNode<T>(cb: (node: Node) => T | undefined, node: Node | undefined): T | undefined {
    return node === undefined ? undefined : cb(node);
}

function visitNodes<T>(cb: (node: Node) => T | undefined, nodes: readonly Node[]): T | undefined {
    for (const node of nodes) {
        const result = cb(node);
        if (result !== undefined)
            return result;
    }
    return undefined;
}

/**
 * Invokes `cb` for each child of `node` in source order.
 * Stops at and returns the first result that is not `undefined`.
 */
export function forEachChild<T>(node: Node, cb: (node: Node) => T | undefined): T | undefined {
    switch (node.kind) {
        case SyntaxKind.Module:
            return visitNodes(cb, node.statements);
        case SyntaxKind.ExpressionStatement:
            return cb(node.expression);
        case SyntaxKind.AssignmentStatement:
            return visitNodes(cb, node.targets) ?? cb(node.value);
        case SyntaxKind.AugmentedAssignment:
            return cb(node.target) ?? cb(node.value);
        case SyntaxKind.AnnotatedAssignment:
            return cb(node.target) ?? cb(node.annotation) ?? visitNode(cb, node.value);
        case SyntaxKind.PassStatement:
        case SyntaxKind.BreakStatement:
        case SyntaxKind.ContinueStatement:
        case SyntaxKind.Name:
        case SyntaxKind.NumericLiteral:
        case SyntaxKind.KeywordLiteral:
            return undefined;
        case SyntaxKind.ReturnStatement:
            return visitNode(cb, node.value);
        case SyntaxKind.DelStatement:
            return visitNodes(cb, node.targets);
        case SyntaxKind.RaiseStatement:
            return visitNode(cb, node.exception) ?? visitNode(cb, node.cause);
        case SyntaxKind.AssertStatement:
            return cb(node.condition) ?? visitNode(cb, node.message);
        case SyntaxKind.GlobalStatement:
        case SyntaxKind.NonlocalStatement:
        case SyntaxKind.ImportStatement:
        case SyntaxKind.ImportFromStatement:
            return visitNodes(cb, node.names);
        case SyntaxKind.PrintStatement:
            return visitNode(cb, node.destination) ?? visitNodes(cb, node.values);
        case SyntaxKind.IfStatement:
        case SyntaxKind.WhileStatement:
            return cb(node.condition) ?? visitNodes(cb, node.body) ?? visitNodes(cb, node.orelse);
        case SyntaxKind.ForStatement:
            return cb(node.target) ?? cb(node.iterable) ?? visitNodes(cb, node.body) ?? visitNodes(cb, node.orelse);
        case SyntaxKind.TryStatement:
            return visitNodes(cb, node.body) ??
                visitNodes(cb, node.handlers) ??
                visitNodes(cb, node.orelse) ??
                visitNodes(cb, node.finalbody);
        case SyntaxKind.WithStatement:
            return visitNodes(cb, node.items) ?? visitNodes(cb, node.body);
        case SyntaxKind.FunctionDef:
            return visitNodes(cb, node.decorators) ??
                cb(node.name) ??
                visitNodes(cb, node.parameters) ??
                visitNode(cb, node.returns) ??
                visitNodes(cb, node.body);
        case SyntaxKind.ClassDef:
            return visitNodes(cb, node.decorators) ?? cb(node.name) ?? visitNodes(cb, node.arguments) ?? visitNodes(cb, node.body);
        case SyntaxKind.ImportAlias:
            return visitNodes(cb, node.path) ?? visitNode(cb, node.alias);
        case SyntaxKind.ExceptClause:
            return visitNode(cb, node.exception) ?? visitNode(cb, node.name) ?? visitNodes(cb, node.body);
        case SyntaxKind.WithItem:
            return cb(node.expression) ?? visitNode(cb, node.target);
        case SyntaxKind.Parameter:
            return visitNode(cb, node.name) ?? visitNode(cb, node.annotation) ?? visitNode(cb, node.defaultValue);
        case SyntaxKind.Argument:
            return visitNode(cb, node.name) ?? cb(node.value);
        case SyntaxKind.KeyValuePair:
            return cb(node.key) ?? cb(node.value);
        case SyntaxKind.StringLiteral:
            return visitNodes(cb, node.elements);
        case SyntaxKind.StringElement:
            return visitNodes(cb, node.interpolations);
        case SyntaxKind.Interpolation:
            return cb(node.expression) ?? visitNodes(cb, node.formatSpec);
        case SyntaxKind.ComprehensionFor:
            return cb(node.target) ?? cb(node.iterable);
        case SyntaxKind.ComprehensionIf:
            return cb(node.condition);
        case SyntaxKind.Tuple:
        case SyntaxKind.ListLiteral:
        case SyntaxKind.SetLiteral:
            return visitNodes(cb, node.elements);
        case SyntaxKind.DictLiteral:
            return visitNodes(cb, node.entries);
        case SyntaxKind.Parenthesized:
        case SyntaxKind.Starred:
        case SyntaxKind.AwaitExpression:
            return cb(node.expression);
        case SyntaxKind.Call:
            return cb(node.callee) ?? visitNodes(cb, node.arguments);
        case SyntaxKind.Attribute:
            return cb(node.object) ?? cb(node.name);
        case SyntaxKind.Subscript:
            return cb(node.object) ?? cb(node.index);
        case SyntaxKind.Slice:
            return visitNode(cb, node.lower) ?? visitNode(cb, node.upper) ?? visitNode(cb, node.step);
        case SyntaxKind.BinaryExpression:
            return cb(node.left) ?? cb(node.right);
        case SyntaxKind.UnaryExpression:
            return cb(node.operand);
        case SyntaxKind.ConditionalExpression:
            return cb(node.whenTrue) ?? cb(node.condition) ?? cb(node.whenFalse);
        case SyntaxKind.Lambda:
            return visitNodes(cb, node.parameters) ?? cb(node.body);
        case SyntaxKind.ListComprehension:
        case SyntaxKind.SetComprehension:
        case SyntaxKind.GeneratorExpression:
            return cb(node.element) ?? visitNodes(cb, node.clauses);
        case SyntaxKind.DictComprehension:
            return cb(node.key) ?? cb(node.value) ?? visitNodes(cb, node.clauses);
        case SyntaxKind.AssignmentExpression:
            return cb(node.name) ?? cb(node.value);
        case SyntaxKind.YieldExpression:
            return visitNode(cb, node.value);
    }
}

export function getChildren(node: Node): Node[] {
    const result: Node[] = [];
    forEachChild(node, (child) => void result.push(child));
    return result;
}

/** Walks up the parent chain and returns the first ancestor satisfying `predicate`. */
export function findAncestor<T extends Node>(node: Node, predicate: (node: Node) => node is T): T | undefined {
    let current = node.parent;
    while (current !== undefined) {
        if (predicate(current))
            return current;
        current = current.parent;
    }
    return undefined;
}

export function getSourceFileOfNode(node: Node) {
    let current = node;
    while (current.parent !== undefined)
        current = current.parent;
    return current.kind === SyntaxKind.Module ? current : undefined;
}
