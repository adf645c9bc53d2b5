import { assert } from 'chai';
import { parseModule } from '../syntax/parser';
import { SyntaxKind } from '../syntax/types';
import { findAncestor, getSourceFileOfNode } from '../syntax/visitor';
import { isFunctionDef } from '../typeguard/node';
import { python2, python3 } from '../util/dialect';
import { ScopeKind } from '../util/scope';
import { getCalleeName, getScopeKind, isComprehensionScoped } from '../util/util';
import { expectKind } from './utils';

describe('getScopeKind', () => {
    it('returns the kind of scope boundaries', () => {
        const module = parseModule('def f():\n    return [x for x in y]\n');
        const fn = expectKind(module.statements[0], SyntaxKind.FunctionDef);
        const statement = expectKind(fn.body[0], SyntaxKind.ReturnStatement);
        const comprehension = expectKind(statement.value, SyntaxKind.ListComprehension);
        assert.strictEqual(getScopeKind(module, python3), ScopeKind.Module);
        assert.strictEqual(getScopeKind(fn, python3), ScopeKind.Function);
        assert.strictEqual(getScopeKind(comprehension, python3), ScopeKind.Comprehension);
        assert.isUndefined(getScopeKind(comprehension, python2));
        assert.isUndefined(getScopeKind(statement, python3));
        assert.isFalse(isComprehensionScoped(comprehension, python2));
    });
});

describe('getCalleeName', () => {
    it('returns plain callee names only', () => {
        const module = parseModule('a()\n((b))()\nc.d()\ne()()\n');
        const names = module.statements.map((statement) =>
            getCalleeName(expectKind(expectKind(statement, SyntaxKind.ExpressionStatement).expression, SyntaxKind.Call)));
        assert.deepStrictEqual(names, ['a', 'b', undefined, undefined]);
    });
});

describe('findAncestor', () => {
    it('walks up the parent chain', () => {
        const module = parseModule('def f():\n    return x\n');
        const fn = expectKind(module.statements[0], SyntaxKind.FunctionDef);
        const name = expectKind(expectKind(fn.body[0], SyntaxKind.ReturnStatement).value, SyntaxKind.Name);
        assert.strictEqual(findAncestor(name, isFunctionDef), fn);
        assert.isUndefined(findAncestor(fn, isFunctionDef));
        assert.strictEqual(getSourceFileOfNode(name), module);
    });
});
