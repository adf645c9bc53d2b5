import { createSourceSpan, SourceSpan } from '../syntax/position';
import { Binding, BindingKind, Scope, ScopeKind, ScopeTree } from './scope';

export const UNUSED_LOCAL_VARIABLE_RULE = 'unused-local-variable';

export interface LivenessOptions {
    /** Names that are never reported. Defaults to `['_']`. */
    ignoredNames?: readonly string[];
    /** Report unread function and lambda parameters. */
    reportParameters?: boolean;
    ruleName?: string;
}

export interface Finding {
    readonly binding: Binding;
    readonly ruleName: string;
    readonly message: string;
    readonly span: SourceSpan;
}

const REPORTED_SCOPE_KINDS = ScopeKind.Function | ScopeKind.Lambda | ScopeKind.Comprehension;

export function getUnusedLocalVariableMessage(name: string) {
    return `Remove the unused local variable "${name}".`;
}

export function isReportedScope(scope: Scope): boolean {
    return (scope.kind & REPORTED_SCOPE_KINDS) !== 0 && !scope.reflective;
}

export function isReportableBinding(binding: Binding, options: LivenessOptions = {}): boolean {
    if (binding.lenient || (options.ignoredNames ?? ['_']).includes(binding.name))
        return false;
    switch (binding.kind) {
        case BindingKind.Assignment:
        case BindingKind.LoopTarget:
        case BindingKind.ComprehensionTarget:
        case BindingKind.WithTarget:
        case BindingKind.ExceptTarget:
            return true;
        case BindingKind.Parameter:
            return options.reportParameters === true;
        default:
            return false;
    }
}

/**
 * Reports every reportable binding in a function, lambda or comprehension scope that is never read.
 * Needs the read flags set by `resolveUsages`. The scope tree is not modified.
 */
export function evaluateLiveness(scopeTree: ScopeTree, options: LivenessOptions = {}): Finding[] {
    const ruleName = options.ruleName ?? UNUSED_LOCAL_VARIABLE_RULE;
    const {lineStarts} = scopeTree.module;
    const result: Finding[] = [];
    for (const scope of scopeTree.getScopes()) {
        if (!isReportedScope(scope))
            continue;
        for (const bindings of scope.bindings.values()) {
            // names that are also imported are left to the unused import check
            if (bindings.some((binding) => binding.kind === BindingKind.Import))
                continue;
            for (const binding of bindings)
                if (!binding.read && isReportableBinding(binding, options))
                    result.push({
                        binding,
                        ruleName,
                        message: getUnusedLocalVariableMessage(binding.name),
                        span: createSourceSpan(lineStarts, binding.location.pos, binding.location.end),
                    });
        }
    }
    return result.sort((a, b) => a.span.pos - b.span.pos);
}
