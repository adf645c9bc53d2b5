import { assert } from 'chai';
import { parseModule } from '../syntax/parser';
import { SyntaxKind } from '../syntax/types';
import {
    isCall,
    isComprehension,
    isComprehensionClause,
    isFunctionLike,
    isName,
    isScopeNode,
    isTupleOrList,
} from '../typeguard/node';
import { expectKind } from './utils';

describe('typeguards', () => {
    it('narrows by kind', () => {
        const module = parseModule('f(x)\n');
        const call = expectKind(module.statements[0], SyntaxKind.ExpressionStatement).expression;
        assert.isTrue(isCall(call));
        assert.isFalse(isName(call));
        if (isCall(call))
            assert.isTrue(isName(call.callee));
    });

    it('recognizes scope nodes', () => {
        const module = parseModule('def f():\n    pass\nclass C:\n    pass\ng = lambda: 1\nx.y\n');
        assert.isTrue(isScopeNode(module));
        assert.deepStrictEqual(module.statements.slice(0, 2).map(isScopeNode), [true, true]);
        const lambda = expectKind(module.statements[2], SyntaxKind.AssignmentStatement).value;
        assert.isTrue(isScopeNode(lambda));
        assert.isTrue(isFunctionLike(lambda));
        assert.isFalse(isFunctionLike(module.statements[1]));
        assert.isFalse(isScopeNode(expectKind(module.statements[3], SyntaxKind.ExpressionStatement).expression));
    });

    it('recognizes every kind of comprehension', () => {
        const module = parseModule('[a for a in b]\n{a for a in b}\n(a for a in b)\n{a: 1 for a in b if a}\n[a, b]\n');
        const expressions = module.statements.map((statement) => expectKind(statement, SyntaxKind.ExpressionStatement).expression);
        assert.deepStrictEqual(expressions.map(isComprehension), [true, true, true, true, false]);
        const dict = expectKind(expressions[3], SyntaxKind.DictComprehension);
        assert.deepStrictEqual(dict.clauses.map(isComprehensionClause), [true, true]);
        assert.isTrue(isTupleOrList(expressions[4]));
    });
});
