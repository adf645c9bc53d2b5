import { ParseError } from '../util/errors';
import { computeLineStarts, createSourceSpan } from './position';
import { Scanner, StringToken, Token, TokenKind } from './scanner';
import {
    Argument,
    ComprehensionClause,
    ExceptClause,
    Expression,
    FunctionDef,
    ClassDef,
    IfStatement,
    ImportAlias,
    Interpolation,
    KeyValuePair,
    Lambda,
    Module,
    Name,
    Node,
    Parameter,
    ParameterPrefix,
    Starred,
    Statement,
    StringElement,
    StringLiteral,
    SyntaxKind,
    WithItem,
    YieldExpression,
} from './types';
import { forEachChild } from './visitor';

const KEYWORDS = new Set([
    'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue', 'def', 'del',
    'elif', 'else', 'except', 'finally', 'for', 'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal',
    'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);
const EXPRESSION_KEYWORDS = new Set(['not', 'lambda', 'None', 'True', 'False', 'await']);
const EXPRESSION_START_OPERATORS = new Set(['(', '[', '{', '-', '+', '~', '*', '...']);
const AUGMENTED_ASSIGNMENT_OPERATORS = new Set(['+=', '-=', '*=', '/=', '//=', '%=', '**=', '>>=', '<<=', '&=', '|=', '^=', '@=']);
const COMPARISON_OPERATORS = new Set(['<', '>', '==', '>=', '<=', '!=', '<>']);
const BINARY_OPERATOR_LEVELS = [['|'], ['^'], ['&'], ['<<', '>>'], ['+', '-'], ['*', '/', '%', '//', '@']];

/**
 * Parses the subset of Python understood by the analysis.
 * Parent pointers are set on every node of the returned tree.
 */
export function parseModule(text: string, fileName = 'module.py'): Module {
    const lineStarts = computeLineStarts(text);
    const {tokens, comments} = new Scanner(text, fileName, lineStarts, 0, text.length, false).scan();
    const statements = new Parser(text, fileName, lineStarts, tokens).parseStatements();
    const module: Module = {
        kind: SyntaxKind.Module,
        pos: 0,
        end: text.length,
        parent: undefined,
        fileName,
        text,
        lineStarts,
        statements,
        comments,
    };
    setParentNodes(module);
    return module;
}

function setParentNodes(parent: Node): void {
    forEachChild(parent, (child) => {
        child.parent = parent;
        setParentNodes(child);
    });
}

function getParameterPrefix(token: Token): ParameterPrefix | undefined {
    if (token.kind !== TokenKind.Operator)
        return;
    switch (token.text) {
        case '*':
            return '*';
        case '**':
            return '**';
        case '/':
            return '/';
    }
}

function createKeyValuePair(key: Expression, value: Expression): KeyValuePair {
    return {kind: SyntaxKind.KeyValuePair, pos: key.pos, end: value.end, parent: undefined, key, value};
}

class Parser {
    private _index = 0;
    private _lastEnd = 0;

    constructor(
        private readonly _text: string,
        private readonly _fileName: string,
        private readonly _lineStarts: readonly number[],
        private readonly _tokens: readonly Token[],
    ) {}

    public parseStatements(): Statement[] {
        const statements: Statement[] = [];
        while (this._token().kind !== TokenKind.EndOfFile)
            this._parseStatement(statements);
        return statements;
    }

    /** Parses the expression of an f-string replacement field. */
    public parseEmbeddedExpression(): Expression {
        if (this._token().kind === TokenKind.EndOfFile)
            this._error('f-string: empty expression not allowed');
        const expression = this._isKeyword('yield')
            ? this._parseYield()
            : this._parseExpressionList(() => this._parseTestOrStar());
        if (this._token().kind !== TokenKind.EndOfFile)
            this._error('f-string: expecting \'}\'');
        return expression;
    }

    // Statements

    private _parseStatement(out: Statement[]) {
        const token = this._token();
        if (token.kind === TokenKind.Indent)
            this._error('Unexpected indent');
        if (token.kind === TokenKind.Operator && token.text === '@')
            return void out.push(this._parseDecorated());
        if (token.kind === TokenKind.Name) {
            switch (token.text) {
                case 'if':
                    return void out.push(this._parseIf());
                case 'while':
                    return void out.push(this._parseWhile());
                case 'for':
                    return void out.push(this._parseFor(token.pos, false));
                case 'try':
                    return void out.push(this._parseTry());
                case 'with':
                    return void out.push(this._parseWith(token.pos, false));
                case 'def':
                    return void out.push(this._parseFunctionDef(token.pos, [], false));
                case 'class':
                    return void out.push(this._parseClassDef(token.pos, []));
                case 'async':
                    this._advance();
                    return void out.push(this._parseAsyncStatement(token.pos, []));
            }
        }
        this._parseSimpleStatements(out);
    }

    private _parseAsyncStatement(start: number, decorators: Expression[]): Statement {
        if (this._isKeyword('def'))
            return this._parseFunctionDef(start, decorators, true);
        if (decorators.length === 0) {
            if (this._isKeyword('for'))
                return this._parseFor(start, true);
            if (this._isKeyword('with'))
                return this._parseWith(start, true);
        }
        return this._error('Unexpected token after \'async\'');
    }

    private _parseDecorated(): Statement {
        const start = this._token().pos;
        const decorators: Expression[] = [];
        while (this._consumeOperator('@')) {
            decorators.push(this._parseNamedExpression());
            this._expectLineEnd();
        }
        if (this._isKeyword('def'))
            return this._parseFunctionDef(start, decorators, false);
        if (this._isKeyword('class'))
            return this._parseClassDef(start, decorators);
        if (this._consumeKeyword('async'))
            return this._parseAsyncStatement(start, decorators);
        return this._error('Expected function or class definition after decorator');
    }

    private _parseSimpleStatements(out: Statement[]) {
        do
            out.push(this._parseSimpleStatement());
        while (this._consumeOperator(';') && !this._isLineEnd());
        this._expectLineEnd();
    }

    private _parseSimpleStatement(): Statement {
        const token = this._token();
        if (token.kind === TokenKind.Name) {
            switch (token.text) {
                case 'pass':
                    this._advance();
                    return {kind: SyntaxKind.PassStatement, pos: token.pos, end: token.end, parent: undefined};
                case 'break':
                    this._advance();
                    return {kind: SyntaxKind.BreakStatement, pos: token.pos, end: token.end, parent: undefined};
                case 'continue':
                    this._advance();
                    return {kind: SyntaxKind.ContinueStatement, pos: token.pos, end: token.end, parent: undefined};
                case 'return': {
                    this._advance();
                    const value = this._isSimpleStatementEnd() ? undefined : this._parseExpressionList(() => this._parseTestOrStar());
                    return {kind: SyntaxKind.ReturnStatement, pos: token.pos, end: this._lastEnd, parent: undefined, value};
                }
                case 'del': {
                    this._advance();
                    const targets: Expression[] = [];
                    do
                        targets.push(this._parseExpressionOrStar());
                    while (this._consumeOperator(',') && !this._isSimpleStatementEnd());
                    return {kind: SyntaxKind.DelStatement, pos: token.pos, end: this._lastEnd, parent: undefined, targets};
                }
                case 'raise': {
                    this._advance();
                    let exception: Expression | undefined;
                    let cause: Expression | undefined;
                    if (!this._isSimpleStatementEnd()) {
                        exception = this._parseExpressionList(() => this._parseTest());
                        if (this._consumeKeyword('from'))
                            cause = this._parseTest();
                    }
                    return {kind: SyntaxKind.RaiseStatement, pos: token.pos, end: this._lastEnd, parent: undefined, exception, cause};
                }
                case 'assert': {
                    this._advance();
                    const condition = this._parseTest();
                    const message = this._consumeOperator(',') ? this._parseTest() : undefined;
                    return {kind: SyntaxKind.AssertStatement, pos: token.pos, end: this._lastEnd, parent: undefined, condition, message};
                }
                case 'global':
                case 'nonlocal': {
                    this._advance();
                    const names = [this._parseName()];
                    while (this._consumeOperator(','))
                        names.push(this._parseName());
                    return token.text === 'global'
                        ? {kind: SyntaxKind.GlobalStatement, pos: token.pos, end: this._lastEnd, parent: undefined, names}
                        : {kind: SyntaxKind.NonlocalStatement, pos: token.pos, end: this._lastEnd, parent: undefined, names};
                }
                case 'import': {
                    this._advance();
                    const names: ImportAlias[] = [];
                    do
                        names.push(this._parseImportAlias(true));
                    while (this._consumeOperator(','));
                    return {kind: SyntaxKind.ImportStatement, pos: token.pos, end: this._lastEnd, parent: undefined, names};
                }
                case 'from':
                    return this._parseImportFrom();
                case 'print':
                    if (this._isPrintStatement())
                        return this._parsePrintStatement();
            }
        }
        return this._parseExpressionStatement();
    }

    private _parseExpressionStatement(): Statement {
        const start = this._token().pos;
        const first = this._parseAssignmentValue();
        if (this._isOperator('=')) {
            const targets = [first];
            let value: Expression;
            for (;;) {
                this._advance();
                value = this._parseAssignmentValue();
                if (!this._isOperator('='))
                    break;
                targets.push(value);
            }
            return {kind: SyntaxKind.AssignmentStatement, pos: start, end: this._lastEnd, parent: undefined, targets, value};
        }
        const token = this._token();
        if (token.kind === TokenKind.Operator && AUGMENTED_ASSIGNMENT_OPERATORS.has(token.text)) {
            this._advance();
            const value = this._parseAssignmentValue();
            return {
                kind: SyntaxKind.AugmentedAssignment,
                pos: start,
                end: this._lastEnd,
                parent: undefined,
                target: first,
                operator: token.text,
                value,
            };
        }
        if (this._consumeOperator(':')) {
            const annotation = this._parseTest();
            const value = this._consumeOperator('=') ? this._parseAssignmentValue() : undefined;
            return {kind: SyntaxKind.AnnotatedAssignment, pos: start, end: this._lastEnd, parent: undefined, target: first, annotation, value};
        }
        return {kind: SyntaxKind.ExpressionStatement, pos: start, end: this._lastEnd, parent: undefined, expression: first};
    }

    private _parseAssignmentValue(): Expression {
        return this._isKeyword('yield') ? this._parseYield() : this._parseExpressionList(() => this._parseTestOrStar());
    }

    private _parseImportAlias(dotted: boolean): ImportAlias {
        const start = this._token().pos;
        const path = [this._parseName()];
        while (dotted && this._consumeOperator('.'))
            path.push(this._parseName());
        const alias = this._consumeKeyword('as') ? this._parseName() : undefined;
        return {kind: SyntaxKind.ImportAlias, pos: start, end: this._lastEnd, parent: undefined, path, alias};
    }

    private _parseImportFrom(): Statement {
        const start = this._advance().pos;
        let module = '';
        while (this._isOperator('.') || this._isOperator('...'))
            module += this._advance().text;
        if (!this._isKeyword('import')) {
            module += this._parseName().text;
            while (this._consumeOperator('.'))
                module += '.' + this._parseName().text;
        }
        this._expectKeyword('import');
        const names: ImportAlias[] = [];
        if (this._consumeOperator('*'))
            return {kind: SyntaxKind.ImportFromStatement, pos: start, end: this._lastEnd, parent: undefined, module, names, wildcard: true};
        const parenthesized = this._consumeOperator('(');
        do {
            if (parenthesized && this._isOperator(')'))
                break;
            names.push(this._parseImportAlias(false));
        } while (this._consumeOperator(','));
        if (parenthesized)
            this._expectOperator(')');
        return {kind: SyntaxKind.ImportFromStatement, pos: start, end: this._lastEnd, parent: undefined, module, names, wildcard: false};
    }

    private _isPrintStatement() {
        const next = this._peekToken(1);
        switch (next.kind) {
            case TokenKind.Number:
            case TokenKind.String:
                return true;
            case TokenKind.Name:
                return !KEYWORDS.has(next.text) || EXPRESSION_KEYWORDS.has(next.text);
            case TokenKind.Operator:
                return next.text === '>>' || next.text === '{' || next.text === '~';
            default:
                return false;
        }
    }

    private _parsePrintStatement(): Statement {
        const start = this._advance().pos;
        let destination: Expression | undefined;
        const values: Expression[] = [];
        if (this._consumeOperator('>>')) {
            destination = this._parseTest();
            if (!this._consumeOperator(','))
                return {kind: SyntaxKind.PrintStatement, pos: start, end: this._lastEnd, parent: undefined, destination, values};
        }
        while (!this._isSimpleStatementEnd()) {
            values.push(this._parseTest());
            if (!this._consumeOperator(','))
                break;
        }
        return {kind: SyntaxKind.PrintStatement, pos: start, end: this._lastEnd, parent: undefined, destination, values};
    }

    private _parseBlock(): Statement[] {
        this._expectOperator(':');
        const statements: Statement[] = [];
        if (this._token().kind !== TokenKind.Newline) {
            this._parseSimpleStatements(statements);
            return statements;
        }
        this._advance();
        if (this._token().kind !== TokenKind.Indent)
            this._error('Expected an indented block');
        this._advance();
        while (this._token().kind !== TokenKind.Dedent && this._token().kind !== TokenKind.EndOfFile)
            this._parseStatement(statements);
        if (this._token().kind === TokenKind.Dedent)
            this._advance();
        return statements;
    }

    private _parseElse(): Statement[] {
        return this._consumeKeyword('else') ? this._parseBlock() : [];
    }

    private _parseIf(): IfStatement {
        const start = this._advance().pos; // `if` or `elif`
        const condition = this._parseNamedExpression();
        const body = this._parseBlock();
        const orelse = this._isKeyword('elif') ? [this._parseIf()] : this._parseElse();
        return {kind: SyntaxKind.IfStatement, pos: start, end: this._lastEnd, parent: undefined, condition, body, orelse};
    }

    private _parseWhile(): Statement {
        const start = this._advance().pos;
        const condition = this._parseNamedExpression();
        const body = this._parseBlock();
        const orelse = this._parseElse();
        return {kind: SyntaxKind.WhileStatement, pos: start, end: this._lastEnd, parent: undefined, condition, body, orelse};
    }

    private _parseFor(start: number, isAsync: boolean): Statement {
        this._expectKeyword('for');
        const target = this._parseTargetList();
        this._expectKeyword('in');
        const iterable = this._parseExpressionList(() => this._parseTestOrStar());
        const body = this._parseBlock();
        const orelse = this._parseElse();
        return {kind: SyntaxKind.ForStatement, pos: start, end: this._lastEnd, parent: undefined, isAsync, target, iterable, body, orelse};
    }

    private _parseTry(): Statement {
        const start = this._advance().pos;
        const body = this._parseBlock();
        const handlers: ExceptClause[] = [];
        while (this._isKeyword('except')) {
            const handlerStart = this._advance().pos;
            let exception: Expression | undefined;
            let name: Name | undefined;
            if (!this._isOperator(':')) {
                exception = this._parseTest();
                if (this._consumeKeyword('as') || this._consumeOperator(','))
                    name = this._parseName();
            }
            const handlerBody = this._parseBlock();
            handlers.push({
                kind: SyntaxKind.ExceptClause,
                pos: handlerStart,
                end: this._lastEnd,
                parent: undefined,
                exception,
                name,
                body: handlerBody,
            });
        }
        const orelse = this._parseElse();
        const finalbody = this._consumeKeyword('finally') ? this._parseBlock() : [];
        if (handlers.length === 0 && finalbody.length === 0)
            this._error('Expected \'except\' or \'finally\' block');
        return {kind: SyntaxKind.TryStatement, pos: start, end: this._lastEnd, parent: undefined, body, handlers, orelse, finalbody};
    }

    private _parseWith(start: number, isAsync: boolean): Statement {
        this._expectKeyword('with');
        const items: WithItem[] = [];
        do {
            const itemStart = this._token().pos;
            const expression = this._parseTest();
            const target = this._consumeKeyword('as') ? this._parseExpressionOrStar() : undefined;
            items.push({kind: SyntaxKind.WithItem, pos: itemStart, end: this._lastEnd, parent: undefined, expression, target});
        } while (this._consumeOperator(','));
        const body = this._parseBlock();
        return {kind: SyntaxKind.WithStatement, pos: start, end: this._lastEnd, parent: undefined, isAsync, items, body};
    }

    private _parseFunctionDef(start: number, decorators: Expression[], isAsync: boolean): FunctionDef {
        this._expectKeyword('def');
        const name = this._parseName();
        this._expectOperator('(');
        const parameters = this._parseParameters(')', true);
        this._expectOperator(')');
        const returns = this._consumeOperator('->') ? this._parseTest() : undefined;
        const body = this._parseBlock();
        return {
            kind: SyntaxKind.FunctionDef,
            pos: start,
            end: this._lastEnd,
            parent: undefined,
            isAsync,
            decorators,
            name,
            parameters,
            returns,
            body,
        };
    }

    private _parseClassDef(start: number, decorators: Expression[]): ClassDef {
        this._expectKeyword('class');
        const name = this._parseName();
        const args = this._isOperator('(') ? this._parseArguments() : [];
        const body = this._parseBlock();
        return {kind: SyntaxKind.ClassDef, pos: start, end: this._lastEnd, parent: undefined, decorators, name, arguments: args, body};
    }

    private _parseParameters(closing: string, allowAnnotations: boolean): Parameter[] {
        const parameters: Parameter[] = [];
        while (!this._isOperator(closing)) {
            const start = this._token().pos;
            const prefix = getParameterPrefix(this._token()) ?? '';
            if (prefix !== '')
                this._advance();
            const name = prefix === '' || prefix === '**' || prefix === '*' && this._token().kind === TokenKind.Name
                ? this._parseName()
                : undefined;
            const annotation = name !== undefined && allowAnnotations && this._consumeOperator(':') ? this._parseTest() : undefined;
            const defaultValue = name !== undefined && this._consumeOperator('=') ? this._parseTest() : undefined;
            parameters.push({kind: SyntaxKind.Parameter, pos: start, end: this._lastEnd, parent: undefined, prefix, name, annotation, defaultValue});
            if (!this._consumeOperator(','))
                break;
        }
        return parameters;
    }

    // Expressions

    /** Parses a comma separated list. Returns a single item as is, otherwise an unparenthesized Tuple. */
    private _parseExpressionList(parseItem: () => Expression): Expression {
        const start = this._token().pos;
        const first = parseItem();
        if (!this._isOperator(','))
            return first;
        const elements = [first];
        while (this._consumeOperator(',') && this._startsExpression())
            elements.push(parseItem());
        return {kind: SyntaxKind.Tuple, pos: start, end: this._lastEnd, parent: undefined, elements, parenthesized: false};
    }

    private _parseTargetList(): Expression {
        return this._parseExpressionList(() => this._parseExpressionOrStar());
    }

    private _parseTestOrStar(): Expression {
        return this._isOperator('*') ? this._parseStarred() : this._parseTest();
    }

    private _parseExpressionOrStar(): Expression {
        return this._isOperator('*') ? this._parseStarred() : this._parseExpression();
    }

    private _parseNamedExpressionOrStar(): Expression {
        return this._isOperator('*') ? this._parseStarred() : this._parseNamedExpression();
    }

    private _parseStarred(): Starred {
        const start = this._advance().pos;
        const expression = this._parseExpression();
        return {kind: SyntaxKind.Starred, pos: start, end: this._lastEnd, parent: undefined, prefix: '*', expression};
    }

    private _parseNamedExpression(): Expression {
        const token = this._token();
        const next = this._peekToken(1);
        if (token.kind === TokenKind.Name && !KEYWORDS.has(token.text) && next.kind === TokenKind.Operator && next.text === ':=') {
            const name = this._parseName();
            this._advance();
            const value = this._parseTest();
            return {kind: SyntaxKind.AssignmentExpression, pos: token.pos, end: this._lastEnd, parent: undefined, name, value};
        }
        return this._parseTest();
    }

    /** @param noConditional parse `test_nocond`, which is used in comprehension conditions */
    private _parseTest(noConditional = false): Expression {
        if (this._isKeyword('lambda'))
            return this._parseLambda(noConditional);
        const start = this._token().pos;
        const whenTrue = this._parseOrTest();
        if (noConditional || !this._consumeKeyword('if'))
            return whenTrue;
        const condition = this._parseOrTest();
        this._expectKeyword('else');
        const whenFalse = this._parseTest();
        return {kind: SyntaxKind.ConditionalExpression, pos: start, end: this._lastEnd, parent: undefined, whenTrue, condition, whenFalse};
    }

    private _parseLambda(noConditional: boolean): Lambda {
        const start = this._advance().pos;
        const parameters = this._parseParameters(':', false);
        this._expectOperator(':');
        const body = this._parseTest(noConditional);
        return {kind: SyntaxKind.Lambda, pos: start, end: this._lastEnd, parent: undefined, parameters, body};
    }

    private _parseOrTest(): Expression {
        return this._parseBooleanOperation('or', () => this._parseAndTest());
    }

    private _parseAndTest(): Expression {
        return this._parseBooleanOperation('and', () => this._parseNotTest());
    }

    private _parseBooleanOperation(operator: 'and' | 'or', parseOperand: () => Expression): Expression {
        const start = this._token().pos;
        let left = parseOperand();
        while (this._consumeKeyword(operator)) {
            const right = parseOperand();
            left = {kind: SyntaxKind.BinaryExpression, pos: start, end: this._lastEnd, parent: undefined, left, operator, right};
        }
        return left;
    }

    private _parseNotTest(): Expression {
        const start = this._token().pos;
        if (!this._consumeKeyword('not'))
            return this._parseComparison();
        const operand = this._parseNotTest();
        return {kind: SyntaxKind.UnaryExpression, pos: start, end: this._lastEnd, parent: undefined, operator: 'not', operand};
    }

    private _parseComparison(): Expression {
        const start = this._token().pos;
        let left = this._parseExpression();
        for (let operator = this._parseComparisonOperator(); operator !== undefined; operator = this._parseComparisonOperator()) {
            const right = this._parseExpression();
            left = {kind: SyntaxKind.BinaryExpression, pos: start, end: this._lastEnd, parent: undefined, left, operator, right};
        }
        return left;
    }

    private _parseComparisonOperator(): string | undefined {
        const token = this._token();
        if (token.kind === TokenKind.Operator && COMPARISON_OPERATORS.has(token.text))
            return this._advance().text;
        if (this._consumeKeyword('in'))
            return 'in';
        if (this._isKeyword('not') && this._isKeyword('in', this._peekToken(1))) {
            this._advance();
            this._advance();
            return 'not in';
        }
        if (this._consumeKeyword('is'))
            return this._consumeKeyword('not') ? 'is not' : 'is';
        return;
    }

    /** Parses a bitwise or arithmetic expression (`expr` in the Python grammar). */
    private _parseExpression(level = 0): Expression {
        if (level === BINARY_OPERATOR_LEVELS.length)
            return this._parseFactor();
        const operators = BINARY_OPERATOR_LEVELS[level];
        const start = this._token().pos;
        let left = this._parseExpression(level + 1);
        for (let token = this._token(); token.kind === TokenKind.Operator && operators.includes(token.text); token = this._token()) {
            this._advance();
            const right = this._parseExpression(level + 1);
            left = {kind: SyntaxKind.BinaryExpression, pos: start, end: this._lastEnd, parent: undefined, left, operator: token.text, right};
        }
        return left;
    }

    private _parseFactor(): Expression {
        const token = this._token();
        if (token.kind === TokenKind.Operator && (token.text === '+' || token.text === '-' || token.text === '~')) {
            this._advance();
            const operand = this._parseFactor();
            return {kind: SyntaxKind.UnaryExpression, pos: token.pos, end: this._lastEnd, parent: undefined, operator: token.text, operand};
        }
        const start = token.pos;
        const base = this._parseAwaitPrimary();
        if (!this._consumeOperator('**'))
            return base;
        const right = this._parseFactor();
        return {kind: SyntaxKind.BinaryExpression, pos: start, end: this._lastEnd, parent: undefined, left: base, operator: '**', right};
    }

    private _parseAwaitPrimary(): Expression {
        const start = this._token().pos;
        if (!this._consumeKeyword('await'))
            return this._parsePrimary();
        const expression = this._parsePrimary();
        return {kind: SyntaxKind.AwaitExpression, pos: start, end: this._lastEnd, parent: undefined, expression};
    }

    private _parsePrimary(): Expression {
        const start = this._token().pos;
        let expression = this._parseAtom();
        for (;;) {
            if (this._isOperator('(')) {
                const args = this._parseArguments();
                expression = {kind: SyntaxKind.Call, pos: start, end: this._lastEnd, parent: undefined, callee: expression, arguments: args};
            } else if (this._consumeOperator('[')) {
                const index = this._parseSubscriptList();
                this._expectOperator(']');
                expression = {kind: SyntaxKind.Subscript, pos: start, end: this._lastEnd, parent: undefined, object: expression, index};
            } else if (this._consumeOperator('.')) {
                const name = this._parseName();
                expression = {kind: SyntaxKind.Attribute, pos: start, end: this._lastEnd, parent: undefined, object: expression, name};
            } else {
                return expression;
            }
        }
    }

    private _parseAtom(): Expression {
        const token = this._token();
        switch (token.kind) {
            case TokenKind.Name:
                switch (token.text) {
                    case 'None':
                    case 'True':
                    case 'False':
                        this._advance();
                        return {kind: SyntaxKind.KeywordLiteral, pos: token.pos, end: token.end, parent: undefined, text: token.text};
                }
                return this._parseName();
            case TokenKind.Number:
                this._advance();
                return {kind: SyntaxKind.NumericLiteral, pos: token.pos, end: token.end, parent: undefined, text: token.text};
            case TokenKind.String:
                return this._parseStrings();
            case TokenKind.Operator:
                switch (token.text) {
                    case '...':
                        this._advance();
                        return {kind: SyntaxKind.KeywordLiteral, pos: token.pos, end: token.end, parent: undefined, text: '...'};
                    case '(':
                        return this._parseParenthesized();
                    case '[':
                        return this._parseList();
                    case '{':
                        return this._parseDictOrSet();
                }
        }
        return this._error('Expression expected');
    }

    private _parseParenthesized(): Expression {
        const start = this._advance().pos;
        if (this._consumeOperator(')'))
            return {kind: SyntaxKind.Tuple, pos: start, end: this._lastEnd, parent: undefined, elements: [], parenthesized: true};
        if (this._isKeyword('yield')) {
            const expression = this._parseYield();
            this._expectOperator(')');
            return {kind: SyntaxKind.Parenthesized, pos: start, end: this._lastEnd, parent: undefined, expression};
        }
        const first = this._parseNamedExpressionOrStar();
        if (this._isComprehensionStart()) {
            const clauses = this._parseComprehensionClauses();
            this._expectOperator(')');
            return {kind: SyntaxKind.GeneratorExpression, pos: start, end: this._lastEnd, parent: undefined, element: first, clauses};
        }
        if (this._isOperator(',')) {
            const elements = [first];
            while (this._consumeOperator(',') && !this._isOperator(')'))
                elements.push(this._parseNamedExpressionOrStar());
            this._expectOperator(')');
            return {kind: SyntaxKind.Tuple, pos: start, end: this._lastEnd, parent: undefined, elements, parenthesized: true};
        }
        this._expectOperator(')');
        return {kind: SyntaxKind.Parenthesized, pos: start, end: this._lastEnd, parent: undefined, expression: first};
    }

    private _parseList(): Expression {
        const start = this._advance().pos;
        if (this._consumeOperator(']'))
            return {kind: SyntaxKind.ListLiteral, pos: start, end: this._lastEnd, parent: undefined, elements: []};
        const first = this._parseNamedExpressionOrStar();
        if (this._isComprehensionStart()) {
            const clauses = this._parseComprehensionClauses();
            this._expectOperator(']');
            return {kind: SyntaxKind.ListComprehension, pos: start, end: this._lastEnd, parent: undefined, element: first, clauses};
        }
        const elements = [first];
        while (this._consumeOperator(',') && !this._isOperator(']'))
            elements.push(this._parseNamedExpressionOrStar());
        this._expectOperator(']');
        return {kind: SyntaxKind.ListLiteral, pos: start, end: this._lastEnd, parent: undefined, elements};
    }

    private _parseDictOrSet(): Expression {
        const start = this._advance().pos;
        if (this._consumeOperator('}'))
            return {kind: SyntaxKind.DictLiteral, pos: start, end: this._lastEnd, parent: undefined, entries: []};
        if (this._isOperator('**'))
            return this._parseDictRest(start, [this._parseDictUnpacking()]);
        const first = this._parseNamedExpressionOrStar();
        if (this._consumeOperator(':')) {
            const value = this._parseTest();
            if (this._isComprehensionStart()) {
                const clauses = this._parseComprehensionClauses();
                this._expectOperator('}');
                return {kind: SyntaxKind.DictComprehension, pos: start, end: this._lastEnd, parent: undefined, key: first, value, clauses};
            }
            return this._parseDictRest(start, [createKeyValuePair(first, value)]);
        }
        if (this._isComprehensionStart()) {
            const clauses = this._parseComprehensionClauses();
            this._expectOperator('}');
            return {kind: SyntaxKind.SetComprehension, pos: start, end: this._lastEnd, parent: undefined, element: first, clauses};
        }
        const elements = [first];
        while (this._consumeOperator(',') && !this._isOperator('}'))
            elements.push(this._parseNamedExpressionOrStar());
        this._expectOperator('}');
        return {kind: SyntaxKind.SetLiteral, pos: start, end: this._lastEnd, parent: undefined, elements};
    }

    private _parseDictRest(start: number, entries: Array<KeyValuePair | Starred>): Expression {
        while (this._consumeOperator(',') && !this._isOperator('}')) {
            if (this._isOperator('**')) {
                entries.push(this._parseDictUnpacking());
            } else {
                const key = this._parseTest();
                this._expectOperator(':');
                entries.push(createKeyValuePair(key, this._parseTest()));
            }
        }
        this._expectOperator('}');
        return {kind: SyntaxKind.DictLiteral, pos: start, end: this._lastEnd, parent: undefined, entries};
    }

    private _parseDictUnpacking(): Starred {
        const start = this._advance().pos;
        const expression = this._parseExpression();
        return {kind: SyntaxKind.Starred, pos: start, end: this._lastEnd, parent: undefined, prefix: '**', expression};
    }

    private _isComprehensionStart() {
        return this._isKeyword('for') || this._isKeyword('async') && this._isKeyword('for', this._peekToken(1));
    }

    private _parseComprehensionClauses(): ComprehensionClause[] {
        const clauses: ComprehensionClause[] = [];
        for (;;) {
            const start = this._token().pos;
            if (this._isComprehensionStart()) {
                const isAsync = this._consumeKeyword('async');
                this._expectKeyword('for');
                const target = this._parseTargetList();
                this._expectKeyword('in');
                const iterable = this._parseOrTest();
                clauses.push({kind: SyntaxKind.ComprehensionFor, pos: start, end: this._lastEnd, parent: undefined, isAsync, target, iterable});
            } else if (this._consumeKeyword('if')) {
                const condition = this._parseTest(true);
                clauses.push({kind: SyntaxKind.ComprehensionIf, pos: start, end: this._lastEnd, parent: undefined, condition});
            } else {
                return clauses;
            }
        }
    }

    private _parseArguments(): Argument[] {
        this._expectOperator('(');
        const args: Argument[] = [];
        while (!this._isOperator(')')) {
            args.push(this._parseArgument());
            if (!this._consumeOperator(','))
                break;
        }
        this._expectOperator(')');
        return args;
    }

    private _parseArgument(): Argument {
        const token = this._token();
        if (token.kind === TokenKind.Operator && (token.text === '*' || token.text === '**')) {
            this._advance();
            const value = this._parseTest();
            const prefix = token.text === '*' ? '*' : '**';
            return {kind: SyntaxKind.Argument, pos: token.pos, end: this._lastEnd, parent: undefined, prefix, name: undefined, value};
        }
        const next = this._peekToken(1);
        if (token.kind === TokenKind.Name && !KEYWORDS.has(token.text) && next.kind === TokenKind.Operator && next.text === '=') {
            const name = this._parseName();
            this._advance();
            const value = this._parseTest();
            return {kind: SyntaxKind.Argument, pos: token.pos, end: this._lastEnd, parent: undefined, prefix: '', name, value};
        }
        let value = this._parseNamedExpression();
        if (this._isComprehensionStart()) {
            const clauses = this._parseComprehensionClauses();
            value = {kind: SyntaxKind.GeneratorExpression, pos: token.pos, end: this._lastEnd, parent: undefined, element: value, clauses};
        }
        return {kind: SyntaxKind.Argument, pos: token.pos, end: this._lastEnd, parent: undefined, prefix: '', name: undefined, value};
    }

    private _parseSubscriptList(): Expression {
        const start = this._token().pos;
        const first = this._parseSubscript();
        if (!this._isOperator(','))
            return first;
        const elements = [first];
        while (this._consumeOperator(',') && !this._isOperator(']'))
            elements.push(this._parseSubscript());
        return {kind: SyntaxKind.Tuple, pos: start, end: this._lastEnd, parent: undefined, elements, parenthesized: false};
    }

    private _parseSubscript(): Expression {
        const start = this._token().pos;
        let lower: Expression | undefined;
        if (!this._isOperator(':')) {
            lower = this._parseNamedExpressionOrStar();
            if (!this._isOperator(':'))
                return lower;
        }
        this._advance();
        const upper = this._isSliceBoundaryEnd() ? undefined : this._parseTest();
        const step = this._consumeOperator(':') && !this._isSliceBoundaryEnd() ? this._parseTest() : undefined;
        return {kind: SyntaxKind.Slice, pos: start, end: this._lastEnd, parent: undefined, lower, upper, step};
    }

    private _isSliceBoundaryEnd() {
        return this._isOperator(':') || this._isOperator(',') || this._isOperator(']');
    }

    private _parseYield(): YieldExpression {
        const start = this._advance().pos;
        if (this._consumeKeyword('from')) {
            const value = this._parseTest();
            return {kind: SyntaxKind.YieldExpression, pos: start, end: this._lastEnd, parent: undefined, value, delegate: true};
        }
        const value = this._startsExpression() ? this._parseExpressionList(() => this._parseTestOrStar()) : undefined;
        return {kind: SyntaxKind.YieldExpression, pos: start, end: this._lastEnd, parent: undefined, value, delegate: false};
    }

    private _parseName(): Name {
        const token = this._token();
        if (token.kind !== TokenKind.Name || KEYWORDS.has(token.text))
            return this._error('Identifier expected');
        this._advance();
        return {kind: SyntaxKind.Name, pos: token.pos, end: token.end, parent: undefined, text: token.text};
    }

    // Strings

    private _parseStrings(): StringLiteral {
        const start = this._token().pos;
        const elements: StringElement[] = [];
        for (let token = this._token(); token.kind === TokenKind.String; token = this._token()) {
            this._advance();
            elements.push(this._createStringElement(token));
        }
        return {kind: SyntaxKind.StringLiteral, pos: start, end: this._lastEnd, parent: undefined, elements};
    }

    private _createStringElement(token: StringToken): StringElement {
        const interpolations = /f/i.test(token.prefix)
            ? this._parseInterpolations(token.contentPos, token.contentEnd, /r/i.test(token.prefix))
            : [];
        return {
            kind: SyntaxKind.StringElement,
            pos: token.pos,
            end: token.end,
            parent: undefined,
            prefix: token.prefix,
            quote: token.quote,
            value: this._text.slice(token.contentPos, token.contentEnd),
            interpolations,
        };
    }

    private _parseInterpolations(start: number, end: number, raw: boolean): Interpolation[] {
        const result: Interpolation[] = [];
        const text = this._text;
        let i = start;
        while (i < end) {
            const ch = text[i];
            if (ch === '\\' && !raw) {
                if (text[i + 1] === 'N' && text[i + 2] === '{') {
                    const close = text.indexOf('}', i + 3);
                    i = close === -1 || close >= end ? end : close + 1;
                } else {
                    i += 2;
                }
            } else if (ch === '{') {
                if (text[i + 1] === '{') {
                    i += 2;
                } else {
                    const field = this._parseReplacementField(i, end);
                    result.push(field);
                    i = field.end;
                }
            } else {
                ++i;
            }
        }
        return result;
    }

    private _parseReplacementField(open: number, limit: number): Interpolation {
        const text = this._text;
        const expressionEnd = this._findReplacementExpressionEnd(open + 1, limit);
        const {tokens} = new Scanner(text, this._fileName, this._lineStarts, open + 1, expressionEnd, true).scan();
        const expression = new Parser(text, this._fileName, this._lineStarts, tokens).parseEmbeddedExpression();
        let i = expressionEnd;
        if (text[i] === '=') {
            ++i;
            while (text[i] === ' ')
                ++i;
        }
        let conversion: string | undefined;
        if (text[i] === '!') {
            const conversionStart = i + 1;
            while (i < limit && text[i] !== ':' && text[i] !== '}')
                ++i;
            conversion = text.slice(conversionStart, i);
        }
        let formatSpec: Interpolation[] = [];
        if (text[i] === ':') {
            const specStart = i + 1;
            let depth = 0;
            for (i = specStart; i < limit; ++i) {
                if (text[i] === '{') {
                    ++depth;
                } else if (text[i] === '}') {
                    if (depth === 0)
                        break;
                    --depth;
                }
            }
            formatSpec = this._parseInterpolations(specStart, i, true);
        }
        if (i >= limit || text[i] !== '}')
            this._errorAt('f-string: expecting \'}\'', open, i);
        return {kind: SyntaxKind.Interpolation, pos: open, end: i + 1, parent: undefined, expression, conversion, formatSpec};
    }

    private _findReplacementExpressionEnd(start: number, limit: number): number {
        const text = this._text;
        let depth = 0;
        for (let i = start; i < limit; ++i) {
            const ch = text[i];
            switch (ch) {
                case '\'':
                case '"': {
                    let j = i + 1;
                    while (j < limit && text[j] !== ch)
                        j += text[j] === '\\' ? 2 : 1;
                    i = j;
                    break;
                }
                case '(':
                case '[':
                case '{':
                    ++depth;
                    break;
                case ')':
                case ']':
                    --depth;
                    break;
                case '}':
                    if (depth === 0)
                        return i;
                    --depth;
                    break;
                case '!':
                    if (depth === 0 && text[i + 1] !== '=')
                        return i;
                    break;
                case ':':
                    if (depth === 0)
                        return i;
                    break;
                case '=':
                    if (depth === 0 && text[i + 1] !== '=' && !'=!<>'.includes(text[i - 1]) && /^\s*[}!:]/.test(text.slice(i + 1, limit)))
                        return i;
            }
        }
        return this._errorAt('f-string: expecting \'}\'', start - 1, limit);
    }

    // Token helpers

    private _token(): Token {
        return this._tokens[this._index];
    }

    private _peekToken(offset: number): Token {
        return this._tokens[Math.min(this._index + offset, this._tokens.length - 1)];
    }

    private _advance(): Token {
        const token = this._tokens[this._index];
        switch (token.kind) {
            case TokenKind.EndOfFile:
                return token;
            case TokenKind.Name:
            case TokenKind.Number:
            case TokenKind.String:
            case TokenKind.Operator:
                // nodes end at their last significant token
                this._lastEnd = token.end;
        }
        ++this._index;
        return token;
    }

    private _isOperator(text: string, token = this._token()) {
        return token.kind === TokenKind.Operator && token.text === text;
    }

    private _isKeyword(text: string, token = this._token()) {
        return token.kind === TokenKind.Name && token.text === text;
    }

    private _consumeOperator(text: string) {
        if (!this._isOperator(text))
            return false;
        this._advance();
        return true;
    }

    private _consumeKeyword(text: string) {
        if (!this._isKeyword(text))
            return false;
        this._advance();
        return true;
    }

    private _expectOperator(text: string) {
        if (!this._consumeOperator(text))
            this._error(`'${text}' expected`);
    }

    private _expectKeyword(text: string) {
        if (!this._consumeKeyword(text))
            this._error(`'${text}' expected`);
    }

    private _isLineEnd() {
        const kind = this._token().kind;
        return kind === TokenKind.Newline || kind === TokenKind.EndOfFile;
    }

    private _isSimpleStatementEnd() {
        return this._isLineEnd() || this._isOperator(';');
    }

    private _expectLineEnd() {
        if (this._token().kind === TokenKind.Newline) {
            this._advance();
        } else if (this._token().kind !== TokenKind.EndOfFile) {
            this._error('End of line expected');
        }
    }

    private _startsExpression(token = this._token()) {
        switch (token.kind) {
            case TokenKind.Number:
            case TokenKind.String:
                return true;
            case TokenKind.Name:
                return !KEYWORDS.has(token.text) || EXPRESSION_KEYWORDS.has(token.text);
            case TokenKind.Operator:
                return EXPRESSION_START_OPERATORS.has(token.text);
            default:
                return false;
        }
    }

    private _error(message: string): never {
        const token = this._token();
        return this._errorAt(message, token.pos, token.end);
    }

    private _errorAt(message: string, pos: number, end: number): never {
        throw new ParseError(message, this._fileName, createSourceSpan(this._lineStarts, pos, end));
    }
}
