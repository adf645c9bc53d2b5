import { assert } from 'chai';
import { parseModule } from '../syntax/parser';
import { buildScopes } from '../util/scope-builder';
import { resolveName, resolveUsages } from '../util/usage';

function analyze(text: string) {
    const module = parseModule(text);
    const tree = buildScopes(module);
    const usages = resolveUsages(module, tree);
    return {module, tree, usages};
}

describe('resolveUsages', () => {
    it('only makes class scopes visible to their own body', () => {
        const {usages} = analyze([
            'x = 1',
            'class C:',
            '    x = 2',
            '    y = x',
            '    def m(self):',
            '        return x',
            '',
        ].join('\n'));
        assert.deepStrictEqual(
            usages.map((usage) => [usage.name, usage.scope, usage.bindings.map((binding) => binding.scope)]),
            [['x', 1, [1]], ['x', 2, [0]]],
        );
    });

    it('resolves names without binding to nothing', () => {
        const {usages} = analyze('print(len(a))\n');
        assert.deepStrictEqual(usages.map((usage) => [usage.name, usage.bindings.length]), [['print', 0], ['len', 0], ['a', 0]]);
    });

    it('marks every binding of the resolved scope as read', () => {
        const {tree} = analyze('def f():\n    a = 1\n    a = 2\n    return a\n');
        const bindings = tree.get(1).bindings.get('a');
        assert.deepStrictEqual(bindings === undefined ? [] : bindings.map((binding) => binding.read), [true, true]);
    });

    it('treats del as read and augmented assignment as write only', () => {
        const {tree} = analyze('def f():\n    a = 1\n    del a\n    b = 0\n    b += 1\n');
        assert.deepStrictEqual(tree.getBindings().map((binding) => `${binding.name} ${binding.read}`), ['f false', 'a true', 'b false', 'b false']);
    });

    it('reads keyword argument values but not their keywords', () => {
        const {usages} = analyze('def f():\n    g(key=value)\n');
        assert.deepStrictEqual(usages.map((usage) => usage.name), ['g', 'value']);
    });

    it('reads the object of attributes only', () => {
        const {usages} = analyze('a.b.c = d.e\n');
        assert.deepStrictEqual(usages.map((usage) => usage.name), ['a', 'd']);
    });

    it('reads names in f-string replacement fields', () => {
        const {tree} = analyze('def f():\n    a = 1\n    b = 2\n    return f"{a:{b}}"\n');
        assert.deepStrictEqual(tree.getBindings().map((binding) => `${binding.name} ${binding.read}`), ['f false', 'a true', 'b true']);
    });

    it('resolves global names to the module scope', () => {
        const {usages} = analyze('def f():\n    global g\n    return g\n');
        assert.deepStrictEqual(usages.map((usage) => usage.bindings.map((binding) => binding.scope)), [[0]]);
    });

    it('rejects a scope tree of another module', () => {
        const tree = buildScopes(parseModule('x = 1\n', 'a.py'));
        assert.throws(
            () => resolveUsages(parseModule('x = 1\n', 'b.py'), tree),
            Error,
            "Scope tree of 'a.py' cannot be used for 'b.py'.",
        );
    });
});

describe('resolveName', () => {
    it('starts the lookup of nonlocal names in the enclosing scope', () => {
        const {tree} = analyze('def outer():\n    x = 0\n    def inner():\n        nonlocal x\n        x = 1\n');
        assert.strictEqual(resolveName(tree, tree.get(2), 'x'), tree.get(1));
        assert.strictEqual(resolveName(tree, tree.get(2), 'outer'), tree.root);
        assert.isUndefined(resolveName(tree, tree.get(2), 'missing'));
    });

    it('skips enclosing class scopes', () => {
        const {tree} = analyze('class C:\n    x = 1\n    def m(self):\n        pass\n');
        assert.strictEqual(resolveName(tree, tree.get(1), 'x'), tree.get(1));
        assert.isUndefined(resolveName(tree, tree.get(2), 'x'));
        assert.strictEqual(resolveName(tree, tree.get(2), 'self'), tree.get(2));
    });
});
