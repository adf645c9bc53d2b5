import type { Module, Name, ScopeNode } from '../syntax/types';
import type { Dialect } from './dialect';

export enum ScopeKind {
    Module = 1 << 0,
    Class = 1 << 1,
    Function = 1 << 2,
    Lambda = 1 << 3,
    Comprehension = 1 << 4,
}

/** Bit mask of ScopeKinds a binding may be placed in. */
export enum ScopeSelector {
    Any = ScopeKind.Module | ScopeKind.Class | ScopeKind.Function | ScopeKind.Lambda | ScopeKind.Comprehension,
    /** Used by assignment expressions, which bind outside of comprehensions. */
    NonComprehension = ScopeKind.Module | ScopeKind.Class | ScopeKind.Function | ScopeKind.Lambda,
}

export enum BindingKind {
    Assignment,
    Parameter,
    LoopTarget,
    UnpackTarget,
    GlobalDeclaration,
    NonlocalDeclaration,
    ComprehensionTarget,
    Import,
    FunctionDeclaration,
    ClassDeclaration,
    WithTarget,
    ExceptTarget,
}

export interface Binding {
    readonly name: string;
    /** Id of the owning scope. */
    readonly scope: number;
    readonly kind: BindingKind;
    /** The name that introduced the binding. */
    readonly location: Name;
    /** Destructuring targets are never reported. */
    readonly lenient: boolean;
    read: boolean;
}

export interface Scope {
    readonly id: number;
    readonly kind: ScopeKind;
    readonly node: ScopeNode;
    /** Lookup only. The module scope has no parent. */
    readonly parent: number | undefined;
    readonly children: number[];
    readonly bindings: Map<string, Binding[]>;
    /** Names declared `global` in this scope. */
    readonly globals: Set<string>;
    /** Names declared `nonlocal` in this scope. */
    readonly nonlocals: Set<string>;
    /** Set if the scope's bindings can be accessed reflectively, e.g. through `locals()`. */
    reflective: boolean;
}

/**
 * Arena of all scopes of a module. Scopes reference each other by id,
 * the module scope always has id 0.
 */
export class ScopeTree {
    private _scopes: Scope[] = [];
    private _nodeToScope = new Map<ScopeNode, number>();

    constructor(public readonly module: Module, public readonly dialect: Dialect) {}

    public get root(): Scope {
        return this.get(0);
    }

    public get size() {
        return this._scopes.length;
    }

    public createScope(kind: ScopeKind, node: ScopeNode, parent: number | undefined): Scope {
        const scope: Scope = {
            id: this._scopes.length,
            kind,
            node,
            parent,
            children: [],
            bindings: new Map(),
            globals: new Set(),
            nonlocals: new Set(),
            reflective: false,
        };
        this._scopes.push(scope);
        this._nodeToScope.set(node, scope.id);
        if (parent !== undefined)
            this.get(parent).children.push(scope.id);
        return scope;
    }

    public get(id: number): Scope {
        if (id < 0 || id >= this._scopes.length)
            throw new RangeError(`Scope ${id} does not exist.`);
        return this._scopes[id];
    }

    public getParent(scope: Scope): Scope | undefined {
        return scope.parent === undefined ? undefined : this.get(scope.parent);
    }

    public getScopeOfNode(node: ScopeNode): Scope | undefined {
        const id = this._nodeToScope.get(node);
        return id === undefined ? undefined : this.get(id);
    }

    /** Returns `scope` or its nearest ancestor whose kind matches `selector`. */
    public getDestinationScope(scope: Scope, selector: ScopeSelector): Scope | undefined {
        for (let current: Scope | undefined = scope; current !== undefined; current = this.getParent(current))
            if (current.kind & selector)
                return current;
        return;
    }

    public addBinding(scope: Scope, name: Name, kind: BindingKind, lenient: boolean): Binding {
        const binding: Binding = {name: name.text, scope: scope.id, kind, location: name, lenient, read: false};
        const existing = scope.bindings.get(name.text);
        if (existing === undefined) {
            scope.bindings.set(name.text, [binding]);
        } else {
            existing.push(binding);
        }
        return binding;
    }

    public getScopes(): readonly Scope[] {
        return this._scopes;
    }

    /** All bindings in scope order, each scope's bindings in order of their first appearance. */
    public getBindings(): Binding[] {
        const result: Binding[] = [];
        for (const scope of this._scopes)
            for (const bindings of scope.bindings.values())
                result.push(...bindings);
        return result;
    }
}
