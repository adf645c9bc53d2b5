import type { Module, Name, ScopeNode } from '../syntax/types';
import { Binding, Scope, ScopeKind, ScopeTree } from './scope';
import { ScopeAwareWalker } from './walker';

export interface UsageSite {
    readonly name: string;
    readonly location: Name;
    /** Id of the scope the read is evaluated in. */
    readonly scope: number;
    /** Empty for builtins and other names without a binding in the module. */
    readonly bindings: readonly Binding[];
}

/**
 * Resolves every read in `module` to the bindings it refers to and marks those bindings as read.
 * `scopeTree` must have been built from the same module.
 */
export function resolveUsages(module: Module, scopeTree: ScopeTree): UsageSite[] {
    if (module !== scopeTree.module)
        throw new Error(`Scope tree of '${scopeTree.module.fileName}' cannot be used for '${module.fileName}'.`);
    return new UsageResolver(scopeTree).resolve();
}

/** Returns the scope `name` resolves to when read in `scope`. */
export function resolveName(tree: ScopeTree, scope: Scope, name: string): Scope | undefined {
    if (scope.globals.has(name))
        return lookupGlobal(tree, name);
    for (let current = scope.nonlocals.has(name) ? tree.getParent(scope) : scope; current !== undefined; current = tree.getParent(current)) {
        // class bodies are not visible to nested scopes
        if (current.kind === ScopeKind.Class && current !== scope)
            continue;
        if (current !== scope && current.globals.has(name))
            return lookupGlobal(tree, name);
        if (current.bindings.has(name))
            return current;
    }
    return;
}

function lookupGlobal(tree: ScopeTree, name: string) {
    return tree.root.bindings.has(name) ? tree.root : undefined;
}

class UsageResolver extends ScopeAwareWalker {
    private _result: UsageSite[] = [];

    constructor(private _tree: ScopeTree) {
        super(_tree.dialect);
    }

    public resolve(): UsageSite[] {
        this._walk(this._tree.module);
        return this._result;
    }

    protected _enterScope(node: ScopeNode): number {
        const scope = this._tree.getScopeOfNode(node);
        if (scope === undefined)
            throw new Error('Scope tree is out of sync with the syntax tree.');
        return scope.id;
    }

    protected _addUse(name: Name) {
        const scope = resolveName(this._tree, this._tree.get(this._scope), name.text);
        const bindings = scope === undefined ? [] : scope.bindings.get(name.text) ?? [];
        for (const binding of bindings)
            binding.read = true;
        this._result.push({name: name.text, location: name, scope: this._scope, bindings});
    }
}
