import * as path from 'path';
import { assert } from 'chai';
import { UnusedLocalVariableRule } from '../rules/unusedLocalVariableRule';
import { python3 } from '../util/dialect';
import { ConfigurationError } from '../util/errors';
import { createLogger, LogLevel } from '../util/logger';
import { FIXTURE_DIR, findTestFiles, getModule, verifyFailures } from './utils';

const RULE_DIR = path.join(FIXTURE_DIR, 'unused-local-variable');

describe('UnusedLocalVariableRule', () => {
    for (const dialect of ['python3', 'python2'] as const) {
        describe(dialect, () => {
            for (const fileName of findTestFiles(path.join(RULE_DIR, dialect))) {
                it(path.basename(fileName), () => {
                    const module = getModule(fileName);
                    verifyFailures(module, new UnusedLocalVariableRule({dialect}).apply(module));
                });
            }
        });
    }

    it('reports positions of failures', () => {
        const failures = new UnusedLocalVariableRule({reportParameters: true}).applyToText('def f(a):\n    pass\n');
        assert.deepStrictEqual(failures, [{
            ruleName: 'unused-local-variable',
            message: 'Remove the unused local variable "a".',
            pos: 6,
            end: 7,
            startPosition: {line: 0, character: 6},
            endPosition: {line: 0, character: 7},
        }]);
    });

    it('uses the configured ignored names', () => {
        const text = 'def f():\n    _ = 1\n    unused = 2\n';
        assert.deepStrictEqual(new UnusedLocalVariableRule().applyToText(text).map((failure) => failure.message), [
            'Remove the unused local variable "unused".',
        ]);
        assert.deepStrictEqual(new UnusedLocalVariableRule({ignoredNames: ['unused']}).applyToText(text).map((failure) => failure.message), [
            'Remove the unused local variable "_".',
        ]);
    });

    it('accepts custom dialects', () => {
        const rule = new UnusedLocalVariableRule({dialect: {...python3, name: 'custom', reflectiveCalls: [{callee: 'dir'}]}});
        assert.strictEqual(rule.dialect.name, 'custom');
        assert.deepStrictEqual(rule.applyToText('def f():\n    a = 1\n    dir()\n'), []);
        assert.lengthOf(rule.applyToText('def f():\n    a = 1\n    locals()\n'), 1);
    });

    it('does not report functions enclosing a reflective call', () => {
        const rule = new UnusedLocalVariableRule();
        assert.deepStrictEqual(rule.applyToText('def f():\n    c = 1\n    def g():\n        return locals()\n    return g\n'), []);
        assert.deepStrictEqual(rule.applyToText('def f():\n    c = 1\n    return lambda: locals()\n'), []);
    });

    it('rejects invalid options', () => {
        assert.throws(
            () => new UnusedLocalVariableRule({reportParameters: 'yes'}),
            ConfigurationError,
            "Invalid options for rule 'unused-local-variable': reportParameters: Expected boolean, received string",
        );
        assert.throws(
            () => new UnusedLocalVariableRule({unknown: true}),
            ConfigurationError,
            "Invalid options for rule 'unused-local-variable': <root>: Unrecognized key(s) in object: 'unknown'",
        );
    });

    it('logs the analysis at debug level', () => {
        const lines: string[] = [];
        const push = (message: string) => void lines.push(message);
        const logger = createLogger({level: LogLevel.Debug, sink: {error: push, warn: push, info: push, debug: push}});
        const failures = new UnusedLocalVariableRule({}, logger).applyToText('def f():\n    x = 1\n    return locals()\n', 'a.py');
        assert.deepStrictEqual(failures, []);
        assert.deepStrictEqual(lines, [
            '[pyscope] debug: analyzed a.py {"dialect":"python3","scopes":2,"usages":1}',
            '[pyscope] debug: scope at a.py:1 is accessed reflectively, its bindings are not reported',
        ]);
    });
});
