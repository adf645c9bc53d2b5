import { assert } from 'chai';
import { parseModule } from '../syntax/parser';
import { SyntaxKind } from '../syntax/types';
import { python2, python3 } from '../util/dialect';
import { ScopeError } from '../util/errors';
import type { EscapeHatchRecognizer } from '../util/escape-hatch';
import { BindingKind, Scope, ScopeKind, ScopeSelector } from '../util/scope';
import { buildScopes } from '../util/scope-builder';
import { getCalleeName } from '../util/util';

function describeBindings(scope: Scope): string[] {
    return Array.from(scope.bindings, ([name, bindings]) => `${name}: ${bindings.map((binding) => BindingKind[binding.kind]).join(', ')}`);
}

describe('buildScopes', () => {
    it('creates a scope for every scope boundary', () => {
        const tree = buildScopes(parseModule([
            'import os',
            'def f(a, *args):',
            '    b = 1',
            '    return [a for a in args]',
            'class C:',
            '    x = lambda y: y',
            '',
        ].join('\n')));
        const scopes = tree.getScopes();
        assert.deepStrictEqual(scopes.map((scope) => ScopeKind[scope.kind]), ['Module', 'Function', 'Comprehension', 'Class', 'Lambda']);
        assert.deepStrictEqual(scopes.map((scope) => scope.parent), [undefined, 0, 1, 0, 3]);
        assert.deepStrictEqual(scopes.map((scope) => scope.children), [[1, 3], [2], [], [4], []]);
        assert.deepStrictEqual(describeBindings(tree.root), ['os: Import', 'f: FunctionDeclaration', 'C: ClassDeclaration']);
        assert.deepStrictEqual(describeBindings(scopes[1]), ['a: Parameter', 'args: Parameter', 'b: Assignment']);
        assert.deepStrictEqual(describeBindings(scopes[2]), ['a: ComprehensionTarget']);
        assert.deepStrictEqual(describeBindings(scopes[3]), ['x: Assignment']);
        assert.deepStrictEqual(describeBindings(scopes[4]), ['y: Parameter']);
        assert.strictEqual(tree.size, 5);
        assert.strictEqual(tree.getBindings().length, 9);
    });

    it('maps scope nodes to their scope', () => {
        const module = parseModule('def f():\n    pass\n');
        const tree = buildScopes(module);
        const fn = module.statements[0];
        assert.strictEqual(fn.kind, SyntaxKind.FunctionDef);
        if (fn.kind === SyntaxKind.FunctionDef) {
            const scope = tree.getScopeOfNode(fn);
            assert.strictEqual(scope !== undefined && scope.id, 1);
        }
        assert.strictEqual(tree.getScopeOfNode(module), tree.root);
        assert.throws(() => tree.get(2), RangeError, 'Scope 2 does not exist.');
    });

    it('binds list comprehension targets in the enclosing scope for python2', () => {
        const module = parseModule('def f():\n    [x for x in y]\n    {z for z in y}\n');
        const tree = buildScopes(module, python2);
        assert.deepStrictEqual(tree.getScopes().map((scope) => ScopeKind[scope.kind]), ['Module', 'Function', 'Comprehension']);
        assert.deepStrictEqual(describeBindings(tree.get(1)), ['x: ComprehensionTarget']);
        assert.deepStrictEqual(describeBindings(tree.get(2)), ['z: ComprehensionTarget']);
        assert.strictEqual(buildScopes(module).size, 4);
    });

    it('marks destructuring targets as lenient', () => {
        const tree = buildScopes(parseModule('a, (b, *c) = t\nfor i, j in t:\n    pass\nk = t\n'));
        assert.deepStrictEqual(
            tree.getBindings().map((binding) => `${binding.name} ${BindingKind[binding.kind]} ${binding.lenient}`),
            ['a UnpackTarget true', 'b UnpackTarget true', 'c UnpackTarget true', 'i LoopTarget true', 'j LoopTarget true', 'k Assignment false'],
        );
    });

    it('binds other statements', () => {
        const tree = buildScopes(parseModule([
            'def f():',
            '    with open() as (g, h):',
            '        pass',
            '    try:',
            '        pass',
            '    except E as e:',
            '        pass',
            '    import a.b, c as d',
            '    from m import n',
            '    x: int',
            '    y: int = 1',
            '    z += 1',
            '',
        ].join('\n')));
        assert.deepStrictEqual(
            describeBindings(tree.get(1)),
            ['g: WithTarget', 'h: WithTarget', 'e: ExceptTarget', 'a: Import', 'd: Import', 'n: Import', 'y: Assignment', 'z: Assignment'],
        );
    });

    it('binds assignment expressions outside of comprehensions', () => {
        const tree = buildScopes(parseModule('def f(v):\n    return [y := w for w in v]\n'));
        assert.deepStrictEqual(describeBindings(tree.get(1)), ['v: Parameter', 'y: Assignment']);
        assert.deepStrictEqual(describeBindings(tree.get(2)), ['w: ComprehensionTarget']);
        assert.strictEqual(tree.getDestinationScope(tree.get(2), ScopeSelector.NonComprehension), tree.get(1));
        assert.strictEqual(tree.getDestinationScope(tree.get(2), ScopeSelector.Any), tree.get(2));
    });

    it('evaluates decorators, defaults and the first iterable in the enclosing scope', () => {
        const tree = buildScopes(parseModule('@dec\ndef f(a=default):\n    pass\n[x for x in (lambda: 1)()]\n'));
        assert.deepStrictEqual(tree.getScopes().map((scope) => scope.parent), [undefined, 0, 0, 0]);
        assert.deepStrictEqual(tree.getScopes().map((scope) => ScopeKind[scope.kind]), ['Module', 'Function', 'Lambda', 'Comprehension']);
    });

    it('redirects bindings of global names to the module scope', () => {
        const tree = buildScopes(parseModule('def f():\n    global g\n    g = 1\n'));
        assert.deepStrictEqual(describeBindings(tree.root), ['f: FunctionDeclaration', 'g: GlobalDeclaration, Assignment']);
        assert.deepStrictEqual(describeBindings(tree.get(1)), []);
        assert.isTrue(tree.get(1).globals.has('g'));
    });

    it('places nonlocal bindings in the enclosing function that binds the name', () => {
        const tree = buildScopes(parseModule([
            'def outer():',
            '    def inner():',
            '        nonlocal x',
            '        x = 1',
            '    x = 0',
            '',
        ].join('\n')));
        assert.deepStrictEqual(describeBindings(tree.get(1)), ['inner: FunctionDeclaration', 'x: Assignment, NonlocalDeclaration, Assignment']);
        assert.deepStrictEqual(describeBindings(tree.get(2)), []);
        assert.isTrue(tree.get(2).nonlocals.has('x'));
    });

    it('skips functions that declare the name nonlocal themselves', () => {
        const tree = buildScopes(parseModule([
            'def a():',
            '    v = 1',
            '    def b():',
            '        nonlocal v',
            '        def c():',
            '            nonlocal v',
            '            v = 2',
            '',
        ].join('\n')));
        const bindings = tree.get(1).bindings.get('v');
        assert.deepStrictEqual(
            bindings === undefined ? [] : bindings.map((binding) => BindingKind[binding.kind]),
            ['Assignment', 'NonlocalDeclaration', 'NonlocalDeclaration', 'Assignment'],
        );
        assert.deepStrictEqual(describeBindings(tree.get(2)), ['c: FunctionDeclaration']);
        assert.deepStrictEqual(describeBindings(tree.get(3)), []);
    });

    it('falls back to the nearest enclosing function', () => {
        const tree = buildScopes(parseModule('def outer():\n    def inner():\n        nonlocal x\n'));
        assert.deepStrictEqual(describeBindings(tree.get(1)), ['inner: FunctionDeclaration', 'x: NonlocalDeclaration']);
    });

    it('throws if there is no enclosing function for a nonlocal name', () => {
        assert.throws(() => buildScopes(parseModule('nonlocal x\n')), ScopeError, "1:10: No binding for nonlocal 'x' found");
        try {
            buildScopes(parseModule('def f():\n    nonlocal x\n'));
            assert.fail('expected a ScopeError');
        } catch (e) {
            assert.instanceOf(e, ScopeError);
            if (e instanceof ScopeError) {
                assert.strictEqual(e.code, 'scope');
                assert.strictEqual(e.variableName, 'x');
                assert.deepStrictEqual(e.span.startPosition, {line: 1, character: 13});
            }
        }
    });

    it('flags scopes with escape hatches as reflective', () => {
        const tree = buildScopes(parseModule([
            'def a():',
            '    return locals()',
            'def b(o):',
            '    return vars(o)',
            'def c():',
            '    return [locals() for _ in y]',
            'def d():',
            '    return lambda: vars()',
            '',
        ].join('\n')));
        assert.deepStrictEqual(
            tree.getScopes().map((scope) => `${ScopeKind[scope.kind]} ${scope.reflective}`),
            ['Module true', 'Function true', 'Function false', 'Function true', 'Comprehension true', 'Function true', 'Lambda true'],
        );
    });

    it('flags every function enclosing an escape hatch', () => {
        const tree = buildScopes(parseModule([
            'def outer():',
            '    def inner():',
            '        return locals()',
            '    def other():',
            '        pass',
            'def unrelated():',
            '    pass',
            '',
        ].join('\n')));
        assert.deepStrictEqual(tree.getScopes().map((scope) => scope.reflective), [true, true, true, false, false]);
    });

    it('uses custom escape hatch recognizers', () => {
        const module = parseModule('def f():\n    x = 1\n    dir()\n    locals()\n');
        const tree = buildScopes(module, python2, [{
            kind: SyntaxKind.Call,
            matches: (node) => node.kind === SyntaxKind.Call && getCalleeName(node) === 'dir',
        }]);
        assert.isTrue(tree.get(1).reflective);
        assert.isFalse(buildScopes(parseModule('def f():\n    locals\n'), python2, []).get(1).reflective);
    });

    it('passes parameters, clauses, import aliases and bound names to recognizers', () => {
        const seen: string[] = [];
        const kinds = [SyntaxKind.Name, SyntaxKind.Parameter, SyntaxKind.ImportAlias, SyntaxKind.ComprehensionFor, SyntaxKind.ComprehensionIf];
        const recognizers = kinds.map((kind): EscapeHatchRecognizer => ({
            kind,
            matches: (node) => {
                seen.push(node.kind === SyntaxKind.Name ? `Name ${node.text}` : SyntaxKind[node.kind]);
                return false;
            },
        }));
        const tree = buildScopes(parseModule('def f(a):\n    import m as n\n    return [x for x in a if x]\n'), python3, recognizers);
        assert.deepStrictEqual(seen, [
            'Name f',
            'Parameter',
            'Name a',
            'ImportAlias',
            'Name m',
            'Name n',
            'Name a',
            'ComprehensionFor',
            'Name x',
            'ComprehensionIf',
            'Name x',
            'Name x',
        ]);
        assert.isFalse(tree.get(1).reflective);
    });

    it('flags the function of a recognized parameter', () => {
        const tree = buildScopes(parseModule('def f(**frame):\n    a = 1\ndef g(b):\n    pass\n'), python3, [{
            kind: SyntaxKind.Parameter,
            matches: (node) => node.kind === SyntaxKind.Parameter && node.prefix === '**',
        }]);
        assert.deepStrictEqual(tree.getScopes().map((scope) => scope.reflective), [true, true, false]);
    });
});
