import bind from 'bind-decorator';
import { forEachChild } from '../syntax/visitor';
import {
    AnyComprehension,
    ClassDef,
    Expression,
    FunctionDef,
    Lambda,
    Module,
    Name,
    Node,
    Parameter,
    ScopeNode,
    SyntaxKind,
} from '../syntax/types';
import type { Dialect } from './dialect';
import { BindingKind, ScopeKind, ScopeSelector } from './scope';
import { getScopeKind } from './util';

/**
 * Walks a module and tracks the scope every node is evaluated in.
 * Subclasses decide what happens when a scope is entered, a name is bound or read.
 *
 * Decorators, default values, annotations, class bases and the iterable of the first `for` clause
 * of a comprehension are evaluated in the enclosing scope.
 */
export abstract class ScopeAwareWalker {
    /** Id of the scope the currently visited node is evaluated in. */
    protected _scope = 0;

    constructor(protected readonly _dialect: Dialect) {}

    /** Returns the id of the scope introduced by `node`. */
    protected abstract _enterScope(node: ScopeNode, kind: ScopeKind): number;

    protected _addBinding(_name: Name, _kind: BindingKind, _lenient: boolean, _selector: ScopeSelector): void {}

    protected _addUse(_name: Name): void {}

    protected _declareGlobal(_name: Name): void {}

    protected _declareNonlocal(_name: Name): void {}

    /** Called once for every node of the tree, before its children, in the scope it is evaluated in. */
    protected _inspect(_node: Node): void {}

    protected _walk(module: Module) {
        this._scope = this._enterScope(module, ScopeKind.Module);
        this._inspect(module);
        module.statements.forEach(this._visit);
    }

    @bind
    protected _visit(node: Node): void {
        this._inspect(node);
        switch (node.kind) {
            case SyntaxKind.Name:
                return this._addUse(node);
            case SyntaxKind.FunctionDef:
                return this._visitFunctionDef(node);
            case SyntaxKind.Lambda:
                return this._visitLambda(node);
            case SyntaxKind.ClassDef:
                return this._visitClassDef(node);
            case SyntaxKind.ListComprehension:
            case SyntaxKind.SetComprehension:
            case SyntaxKind.GeneratorExpression:
            case SyntaxKind.DictComprehension:
                return this._visitComprehension(node);
            case SyntaxKind.AssignmentStatement:
                for (const target of node.targets)
                    this._visitTarget(target, BindingKind.Assignment);
                return this._visit(node.value);
            case SyntaxKind.AugmentedAssignment:
                // a write only, the implicit read does not count
                this._visitTarget(node.target, BindingKind.Assignment);
                return this._visit(node.value);
            case SyntaxKind.AnnotatedAssignment:
                this._visit(node.annotation);
                if (node.value === undefined) {
                    // a bare annotation binds nothing
                    if (node.target.kind === SyntaxKind.Name)
                        return this._inspect(node.target);
                    return this._visit(node.target);
                }
                this._visitTarget(node.target, BindingKind.Assignment);
                return this._visit(node.value);
            case SyntaxKind.AssignmentExpression:
                this._bind(node.name, BindingKind.Assignment, false, ScopeSelector.NonComprehension);
                return this._visit(node.value);
            case SyntaxKind.ForStatement:
                this._visitTarget(node.target, BindingKind.LoopTarget);
                this._visit(node.iterable);
                node.body.forEach(this._visit);
                return node.orelse.forEach(this._visit);
            case SyntaxKind.WithItem:
                this._visit(node.expression);
                if (node.target !== undefined)
                    this._visitTarget(node.target, BindingKind.WithTarget);
                return;
            case SyntaxKind.ExceptClause:
                if (node.exception !== undefined)
                    this._visit(node.exception);
                if (node.name !== undefined)
                    this._bind(node.name, BindingKind.ExceptTarget, false, ScopeSelector.Any);
                return node.body.forEach(this._visit);
            case SyntaxKind.GlobalStatement:
                for (const name of node.names) {
                    this._inspect(name);
                    this._declareGlobal(name);
                }
                return;
            case SyntaxKind.NonlocalStatement:
                for (const name of node.names) {
                    this._inspect(name);
                    this._declareNonlocal(name);
                }
                return;
            case SyntaxKind.ImportStatement:
            case SyntaxKind.ImportFromStatement:
                for (const alias of node.names) {
                    this._inspect(alias);
                    for (const name of alias.path)
                        this._inspect(name);
                    if (alias.alias !== undefined)
                        this._inspect(alias.alias);
                    // `import a.b` binds `a`
                    this._addBinding(alias.alias ?? alias.path[0], BindingKind.Import, false, ScopeSelector.Any);
                }
                return;
            case SyntaxKind.Attribute:
                this._visit(node.object);
                return this._inspect(node.name);
            case SyntaxKind.Argument:
                // the keyword is no reference
                if (node.name !== undefined)
                    this._inspect(node.name);
                return this._visit(node.value);
        }
        return void forEachChild(node, this._visit);
    }

    private _visitTarget(node: Expression, kind: BindingKind, lenient = false): void {
        switch (node.kind) {
            case SyntaxKind.Name:
                return this._bind(node, kind, lenient, ScopeSelector.Any);
            case SyntaxKind.Tuple:
            case SyntaxKind.ListLiteral:
                this._inspect(node);
                for (const element of node.elements)
                    this._visitTarget(element, kind === BindingKind.Assignment ? BindingKind.UnpackTarget : kind, true);
                return;
            case SyntaxKind.Parenthesized:
            case SyntaxKind.Starred:
                this._inspect(node);
                return this._visitTarget(node.expression, kind, lenient);
            default:
                return this._visit(node);
        }
    }

    private _bind(name: Name, kind: BindingKind, lenient: boolean, selector: ScopeSelector) {
        this._inspect(name);
        this._addBinding(name, kind, lenient, selector);
    }

    private _continueWithScope<T extends ScopeNode>(node: T, kind: ScopeKind, next: (node: T) => void) {
        const savedScope = this._scope;
        this._scope = this._enterScope(node, kind);
        next(node);
        this._scope = savedScope;
    }

    private _visitFunctionDef(node: FunctionDef) {
        node.decorators.forEach(this._visit);
        this._visitParameterInitializers(node.parameters);
        if (node.returns !== undefined)
            this._visit(node.returns);
        this._bind(node.name, BindingKind.FunctionDeclaration, false, ScopeSelector.Any);
        this._continueWithScope(node, ScopeKind.Function, () => {
            this._bindParameters(node.parameters);
            node.body.forEach(this._visit);
        });
    }

    private _visitLambda(node: Lambda) {
        this._visitParameterInitializers(node.parameters);
        this._continueWithScope(node, ScopeKind.Lambda, () => {
            this._bindParameters(node.parameters);
            this._visit(node.body);
        });
    }

    private _visitClassDef(node: ClassDef) {
        node.decorators.forEach(this._visit);
        node.arguments.forEach(this._visit);
        this._bind(node.name, BindingKind.ClassDeclaration, false, ScopeSelector.Any);
        this._continueWithScope(node, ScopeKind.Class, () => node.body.forEach(this._visit));
    }

    private _visitComprehension(node: AnyComprehension) {
        const kind = getScopeKind(node, this._dialect);
        if (kind === undefined)
            return this._visitComprehensionParts(node, false);
        const first = node.clauses[0];
        if (first !== undefined && first.kind === SyntaxKind.ComprehensionFor)
            this._visit(first.iterable);
        this._continueWithScope(node, kind, () => this._visitComprehensionParts(node, true));
    }

    private _visitComprehensionParts(node: AnyComprehension, skipFirstIterable: boolean) {
        node.clauses.forEach((clause, i) => {
            this._inspect(clause);
            if (clause.kind === SyntaxKind.ComprehensionIf)
                return this._visit(clause.condition);
            this._visitTarget(clause.target, BindingKind.ComprehensionTarget);
            if (i !== 0 || !skipFirstIterable)
                this._visit(clause.iterable);
        });
        if (node.kind === SyntaxKind.DictComprehension) {
            this._visit(node.key);
            this._visit(node.value);
        } else {
            this._visit(node.element);
        }
    }

    private _visitParameterInitializers(parameters: readonly Parameter[]) {
        for (const parameter of parameters) {
            if (parameter.annotation !== undefined)
                this._visit(parameter.annotation);
            if (parameter.defaultValue !== undefined)
                this._visit(parameter.defaultValue);
        }
    }

    private _bindParameters(parameters: readonly Parameter[]) {
        for (const parameter of parameters) {
            // defaults and annotations were visited in the enclosing scope
            this._inspect(parameter);
            if (parameter.name !== undefined)
                this._bind(parameter.name, BindingKind.Parameter, false, ScopeSelector.Any);
        }
    }
}
