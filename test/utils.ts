import * as fs from 'fs';
import * as path from 'path';
import { assert } from 'chai';
import { parseModule } from '../syntax/parser';
import { getLineAndCharacterOfPosition } from '../syntax/position';
import { Module, Node, SyntaxKind } from '../syntax/types';
import type { RuleFailure } from '../rules/unusedLocalVariableRule';

export const FIXTURE_DIR = path.join(__dirname, 'files');

export function findTestFiles(dir: string) {
    const result = fs.readdirSync(dir);
    for (let i = 0; i < result.length; ++i)
        result[i] = path.join(dir, result[i]);
    return result;
}

export function getModule(fileName: string): Module {
    return parseModule(fs.readFileSync(fileName, 'utf-8'), fileName);
}

function isKind<K extends SyntaxKind>(node: Node, kind: K): node is Extract<Node, {kind: K}> {
    return node.kind === kind;
}

/** Fails unless `node` is of the given kind. */
export function expectKind<K extends SyntaxKind>(node: Node | undefined, kind: K): Extract<Node, {kind: K}> {
    if (node === undefined)
        throw new Error(`Expected ${SyntaxKind[kind]}, got nothing`);
    if (!isKind(node, kind))
        throw new Error(`Expected ${SyntaxKind[kind]}, got ${SyntaxKind[node.kind]}`);
    return node;
}

export interface ExpectedIssue {
    /** 1-based */
    line: number;
    message?: string;
    /** 0-based, set by a `^^^` comment on the following line */
    startCharacter?: number;
    endCharacter?: number;
}

const NONCOMPLIANT = /^#\s*Noncompliant(?:\s*@([+-]\d+))?(?:\s*\{\{(.*?)\}\})?/;
const PRECISE_LOCATION = /^#\s*\^+\s*$/;

/**
 * Reads the expected issues from the comments of a fixture.
 *
 * `# Noncompliant` expects an issue on the same line, `# Noncompliant@+1` on the next one.
 * An optional `{{message}}` is compared with the message of the issue.
 * A comment consisting only of `^` characters marks the exact range of the previous issue.
 */
export function parseExpectedIssues(module: Module): ExpectedIssue[] {
    const result: ExpectedIssue[] = [];
    for (const comment of module.comments) {
        const {line, character} = getLineAndCharacterOfPosition(module.lineStarts, comment.pos);
        const match = NONCOMPLIANT.exec(comment.text);
        if (match !== null) {
            result.push({
                line: line + 1 + (match[1] === undefined ? 0 : Number(match[1])),
                message: match[2],
            });
        } else if (PRECISE_LOCATION.test(comment.text)) {
            const previous = result[result.length - 1];
            if (previous === undefined)
                throw new Error(`${module.fileName}:${line + 1}: precise location without preceding issue`);
            previous.startCharacter = character + comment.text.indexOf('^');
            previous.endCharacter = character + comment.text.lastIndexOf('^') + 1;
        }
    }
    return result.sort((a, b) => a.line - b.line);
}

/** Compares the failures of a rule with the issues expected by the comments of `module`. */
export function verifyFailures(module: Module, failures: readonly RuleFailure[]) {
    const expected = parseExpectedIssues(module);
    assert.deepStrictEqual(
        failures.map((failure) => failure.startPosition.line + 1),
        expected.map((issue) => issue.line),
        `lines of issues in ${path.basename(module.fileName)}`,
    );
    expected.forEach((issue, i) => {
        const failure = failures[i];
        if (issue.message !== undefined)
            assert.strictEqual(failure.message, issue.message, `message of issue on line ${issue.line}`);
        if (issue.startCharacter !== undefined) {
            assert.strictEqual(failure.startPosition.character, issue.startCharacter, `start of issue on line ${issue.line}`);
            assert.strictEqual(failure.endPosition.character, issue.endCharacter, `end of issue on line ${issue.line}`);
        }
    });
}
