import { Node, SyntaxKind } from '../syntax/types';
import type { Dialect, ReflectiveCall } from './dialect';
import type { Scope, ScopeTree } from './scope';
import { getCalleeName } from './util';

/** Recognizes a construct that grants reflective access to the bindings of the scope it is evaluated in. */
export interface EscapeHatchRecognizer {
    readonly kind: SyntaxKind;
    matches(node: Node): boolean;
}

export type RecognizerMap = ReadonlyMap<SyntaxKind, readonly EscapeHatchRecognizer[]>;

/** Matches calls like `locals()` or `vars()`. */
export function createReflectiveCallRecognizer({callee, arity}: ReflectiveCall): EscapeHatchRecognizer {
    return {
        kind: SyntaxKind.Call,
        matches: (node) => node.kind === SyntaxKind.Call &&
            getCalleeName(node) === callee &&
            (arity === undefined || node.arguments.length === arity),
    };
}

export function createEscapeHatchRecognizers(dialect: Dialect): EscapeHatchRecognizer[] {
    return dialect.reflectiveCalls.map(createReflectiveCallRecognizer);
}

export function groupRecognizers(recognizers: readonly EscapeHatchRecognizer[]): RecognizerMap {
    const result = new Map<SyntaxKind, EscapeHatchRecognizer[]>();
    for (const recognizer of recognizers) {
        const existing = result.get(recognizer.kind);
        if (existing === undefined) {
            result.set(recognizer.kind, [recognizer]);
        } else {
            existing.push(recognizer);
        }
    }
    return result;
}

export function isEscapeHatch(node: Node, recognizers: RecognizerMap): boolean {
    const candidates = recognizers.get(node.kind);
    return candidates !== undefined && candidates.some((recognizer) => recognizer.matches(node));
}

/**
 * Flags `scope` and every enclosing scope up to the module as reflective.
 * Returns the flagged scopes, innermost first.
 */
export function markReflective(tree: ScopeTree, scope: Scope): Scope[] {
    const result: Scope[] = [];
    for (let current: Scope | undefined = scope; current !== undefined; current = tree.getParent(current)) {
        current.reflective = true;
        result.push(current);
    }
    return result;
}
