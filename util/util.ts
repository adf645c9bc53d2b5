import { AnyComprehension, Call, Node, SyntaxKind } from '../syntax/types';
import { isComprehension } from '../typeguard/node';
import type { Dialect } from './dialect';
import { ScopeKind } from './scope';

export function isComprehensionScoped(node: AnyComprehension, dialect: Dialect): boolean {
    switch (node.kind) {
        case SyntaxKind.ListComprehension:
            return dialect.comprehensionScoping.list;
        case SyntaxKind.SetComprehension:
            return dialect.comprehensionScoping.set;
        case SyntaxKind.DictComprehension:
            return dialect.comprehensionScoping.dict;
        case SyntaxKind.GeneratorExpression:
            return dialect.comprehensionScoping.generator;
    }
}

/** Returns the kind of scope `node` introduces or `undefined` if it is no scope boundary. */
export function getScopeKind(node: Node, dialect: Dialect): ScopeKind | undefined {
    switch (node.kind) {
        case SyntaxKind.Module:
            return ScopeKind.Module;
        case SyntaxKind.ClassDef:
            return ScopeKind.Class;
        case SyntaxKind.FunctionDef:
            return ScopeKind.Function;
        case SyntaxKind.Lambda:
            return ScopeKind.Lambda;
    }
    if (isComprehension(node) && isComprehensionScoped(node, dialect))
        return ScopeKind.Comprehension;
    return;
}

/** Returns the name of the called function if the callee is a plain name. */
export function getCalleeName(node: Call): string | undefined {
    let callee = node.callee;
    while (callee.kind === SyntaxKind.Parenthesized)
        callee = callee.expression;
    return callee.kind === SyntaxKind.Name ? callee.text : undefined;
}
