import { createSourceSpan } from '../syntax/position';
import type { Module, Name, Node, ScopeNode } from '../syntax/types';
import { python3, Dialect } from './dialect';
import { ScopeError } from './errors';
import { createEscapeHatchRecognizers, EscapeHatchRecognizer, groupRecognizers, isEscapeHatch, markReflective, RecognizerMap } from './escape-hatch';
import { BindingKind, Scope, ScopeKind, ScopeSelector, ScopeTree } from './scope';
import { ScopeAwareWalker } from './walker';

/**
 * Creates the scopes of `module` and records every binding in the scope it belongs to.
 * Scopes containing an escape hatch recognized by one of `recognizers` are flagged as reflective.
 */
export function buildScopes(
    module: Module,
    dialect: Dialect = python3,
    recognizers: readonly EscapeHatchRecognizer[] = createEscapeHatchRecognizers(dialect),
): ScopeTree {
    return new ScopeBuilder(module, dialect, groupRecognizers(recognizers)).build();
}

interface DeferredBinding {
    scope: Scope;
    name: Name;
    kind: BindingKind;
    lenient: boolean;
}

class ScopeBuilder extends ScopeAwareWalker {
    private _tree: ScopeTree;
    private _nonlocalDeclarations: Array<{scope: Scope; name: Name}> = [];
    /** Bindings of names declared `nonlocal`, placed once all scopes are known. */
    private _deferredBindings: DeferredBinding[] = [];

    constructor(module: Module, dialect: Dialect, private _recognizers: RecognizerMap) {
        super(dialect);
        this._tree = new ScopeTree(module, dialect);
    }

    public build(): ScopeTree {
        this._walk(this._tree.module);
        this._placeNonlocalBindings();
        return this._tree;
    }

    protected _enterScope(node: ScopeNode, kind: ScopeKind): number {
        return this._tree.createScope(kind, node, kind === ScopeKind.Module ? undefined : this._scope).id;
    }

    protected _inspect(node: Node) {
        if (isEscapeHatch(node, this._recognizers))
            markReflective(this._tree, this._tree.get(this._scope));
    }

    protected _addBinding(name: Name, kind: BindingKind, lenient: boolean, selector: ScopeSelector) {
        const scope = this._tree.getDestinationScope(this._tree.get(this._scope), selector) ?? this._tree.root;
        if (scope.globals.has(name.text))
            return void this._tree.addBinding(this._tree.root, name, kind, lenient);
        if (scope.nonlocals.has(name.text))
            return void this._deferredBindings.push({scope, name, kind, lenient});
        this._tree.addBinding(scope, name, kind, lenient);
    }

    protected _declareGlobal(name: Name) {
        this._tree.get(this._scope).globals.add(name.text);
        this._tree.addBinding(this._tree.root, name, BindingKind.GlobalDeclaration, false);
    }

    protected _declareNonlocal(name: Name) {
        const scope = this._tree.get(this._scope);
        scope.nonlocals.add(name.text);
        this._nonlocalDeclarations.push({scope, name});
    }

    private _placeNonlocalBindings() {
        // targets are determined before any binding is added to keep the result independent of declaration order
        const targets = this._nonlocalDeclarations.map(({scope, name}) => this._findNonlocalTarget(scope, name));
        this._nonlocalDeclarations.forEach(({name}, i) => {
            this._tree.addBinding(targets[i], name, BindingKind.NonlocalDeclaration, false);
        });
        for (const {scope, name, kind, lenient} of this._deferredBindings) {
            const index = this._nonlocalDeclarations.findIndex((declaration) => declaration.scope === scope && declaration.name.text === name.text);
            this._tree.addBinding(targets[index], name, kind, lenient);
        }
    }

    /**
     * Finds the nearest enclosing function scope that binds `name` itself.
     * Falls back to the nearest enclosing function scope if there is none.
     */
    private _findNonlocalTarget(scope: Scope, name: Name): Scope {
        let fallback: Scope | undefined;
        for (let current = this._tree.getParent(scope); current !== undefined; current = this._tree.getParent(current)) {
            if (current.kind !== ScopeKind.Function)
                continue;
            if (current.bindings.has(name.text) && !current.nonlocals.has(name.text))
                return current;
            if (fallback === undefined)
                fallback = current;
        }
        if (fallback === undefined)
            throw new ScopeError(
                `No binding for nonlocal '${name.text}' found`,
                name.text,
                createSourceSpan(this._tree.module.lineStarts, name.pos, name.end),
            );
        return fallback;
    }
}
