import { ParseError } from '../util/errors';
import { createSourceSpan } from './position';
import type { Comment } from './types';

export enum TokenKind {
    Name,
    Number,
    String,
    Operator,
    Newline,
    Indent,
    Dedent,
    EndOfFile,
}

interface TokenBase<K extends TokenKind> {
    kind: K;
    text: string;
    pos: number;
    end: number;
}

export interface StringToken extends TokenBase<TokenKind.String> {
    prefix: string;
    quote: string;
    contentPos: number;
    contentEnd: number;
}

export type Token = TokenBase<Exclude<TokenKind, TokenKind.String>> | StringToken;

export interface ScanResult {
    tokens: Token[];
    comments: Comment[];
}

// longest first
const OPERATORS = [
    '**=', '//=', '>>=', '<<=', '...',
    '->', ':=', '**', '//', '<<', '>>', '<=', '>=', '==', '!=', '<>',
    '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '@=',
    '+', '-', '*', '/', '%', '@', '&', '|', '^', '~', '<', '>',
    '(', ')', '[', ']', '{', '}', ',', ':', '.', ';', '=', '!',
];

const IDENTIFIER = /[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]*/uy;
const NUMBER = /(?:0[xX][\da-fA-F_]+|0[oO][0-7_]+|0[bB][01_]+|(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?)[jJlL]?/y;
const STRING_PREFIX = /^(?:[rRuUbBfF]|[bB][rR]|[rR][bB]|[fF][rR]|[rR][fF]|[uU][rR])$/;

/**
 * Converts Python source text into tokens, tracking indentation.
 * In `nested` mode the text is scanned as if it was enclosed in brackets:
 * line breaks are insignificant and no INDENT or DEDENT tokens are produced.
 */
export class Scanner {
    private _pos: number;
    private _depth: number;
    private _atLineStart: boolean;
    private _indents = [0];
    private _tokens: Token[] = [];
    private _comments: Comment[] = [];

    constructor(
        private readonly _text: string,
        private readonly _fileName: string,
        private readonly _lineStarts: readonly number[],
        start: number,
        private readonly _end: number,
        private readonly _nested: boolean,
    ) {
        this._pos = start;
        this._depth = _nested ? 1 : 0;
        this._atLineStart = !_nested;
    }

    public scan(): ScanResult {
        for (;;) {
            if (this._atLineStart && this._depth === 0) {
                this._atLineStart = false;
                if (!this._scanIndentation())
                    continue;
            }
            this._skipWhitespace();
            if (this._pos >= this._end)
                break;
            const ch = this._text[this._pos];
            if (ch === '#') {
                this._scanComment();
            } else if (ch === '\\' && this._isLineBreak(this._pos + 1)) {
                this._pos = this._skipLineBreak(this._pos + 1);
            } else if (this._isLineBreak(this._pos)) {
                this._scanLineBreak();
            } else {
                this._scanToken();
            }
        }
        this._finish();
        return {tokens: this._tokens, comments: this._comments};
    }

    private _scanToken() {
        const start = this._pos;
        const ch = this._text[start];
        IDENTIFIER.lastIndex = start;
        const identifier = IDENTIFIER.exec(this._text);
        if (identifier !== null) {
            const end = start + identifier[0].length;
            if (STRING_PREFIX.test(identifier[0]) && (this._text[end] === '\'' || this._text[end] === '"'))
                return this._scanString(start, end);
            return this._push(TokenKind.Name, start, end);
        }
        if (ch === '\'' || ch === '"')
            return this._scanString(start, start);
        if (ch >= '0' && ch <= '9' || ch === '.' && /\d/.test(this._text[start + 1] ?? '')) {
            NUMBER.lastIndex = start;
            const match = NUMBER.exec(this._text);
            if (match !== null)
                return this._push(TokenKind.Number, start, start + match[0].length);
        }
        for (const operator of OPERATORS) {
            if (this._text.startsWith(operator, start) && start + operator.length <= this._end) {
                switch (operator) {
                    case '(':
                    case '[':
                    case '{':
                        ++this._depth;
                        break;
                    case ')':
                    case ']':
                    case '}':
                        if (this._depth > 0)
                            --this._depth;
                }
                return this._push(TokenKind.Operator, start, start + operator.length);
            }
        }
        this._error(`Unexpected character '${ch}'`, start, start + 1);
    }

    private _scanString(start: number, quotePos: number) {
        const q = this._text[quotePos];
        const quote = this._text.startsWith(q + q + q, quotePos) ? q + q + q : q;
        const contentPos = quotePos + quote.length;
        let i = contentPos;
        for (;;) {
            if (i >= this._end)
                this._error('Unterminated string literal', start, i);
            const ch = this._text[i];
            if (ch === '\\') {
                i = this._isLineBreak(i + 1) ? this._skipLineBreak(i + 1) : i + 2;
                continue;
            }
            if (quote.length === 3) {
                if (this._text.startsWith(quote, i))
                    break;
            } else if (ch === q) {
                break;
            } else if (this._isLineBreak(i)) {
                this._error('Unterminated string literal', start, i);
            }
            ++i;
        }
        const end = i + quote.length;
        this._tokens.push({
            kind: TokenKind.String,
            text: this._text.slice(start, end),
            pos: start,
            end,
            prefix: this._text.slice(start, quotePos),
            quote,
            contentPos,
            contentEnd: i,
        });
        this._pos = end;
    }

    /** Returns false if the line is blank or contains only a comment. */
    private _scanIndentation(): boolean {
        let column = 0;
        let i = this._pos;
        for (; i < this._end; ++i) {
            const ch = this._text[i];
            if (ch === ' ') {
                ++column;
            } else if (ch === '\t') {
                column = (Math.floor(column / 8) + 1) * 8;
            } else if (ch === '\f') {
                column = 0;
            } else {
                break;
            }
        }
        this._pos = i;
        if (i >= this._end)
            return true;
        if (this._text[i] === '#' || this._isLineBreak(i)) {
            if (this._text[i] === '#')
                this._scanComment();
            if (this._isLineBreak(this._pos))
                this._pos = this._skipLineBreak(this._pos);
            this._atLineStart = true;
            return false;
        }
        const current = this._indents[this._indents.length - 1];
        if (column > current) {
            this._indents.push(column);
            this._push(TokenKind.Indent, i, i);
        } else {
            while (column < this._indents[this._indents.length - 1]) {
                this._indents.pop();
                this._push(TokenKind.Dedent, i, i);
            }
            if (column !== this._indents[this._indents.length - 1])
                this._error('Unindent does not match any outer indentation level', i, i);
        }
        return true;
    }

    private _scanComment() {
        const start = this._pos;
        let i = start;
        while (i < this._end && !this._isLineBreak(i))
            ++i;
        this._comments.push({pos: start, end: i, text: this._text.slice(start, i)});
        this._pos = i;
    }

    private _scanLineBreak() {
        const start = this._pos;
        this._pos = this._skipLineBreak(start);
        if (this._depth > 0)
            return;
        const last = this._lastToken();
        if (last !== undefined && last.kind !== TokenKind.Newline)
            this._push(TokenKind.Newline, start, this._pos);
        this._atLineStart = true;
    }

    private _finish() {
        if (!this._nested) {
            const last = this._lastToken();
            if (last !== undefined && last.kind !== TokenKind.Newline && last.kind !== TokenKind.Dedent)
                this._push(TokenKind.Newline, this._end, this._end);
            while (this._indents.length > 1) {
                this._indents.pop();
                this._push(TokenKind.Dedent, this._end, this._end);
            }
        }
        this._push(TokenKind.EndOfFile, this._end, this._end);
    }

    private _skipWhitespace() {
        while (this._pos < this._end) {
            const ch = this._text[this._pos];
            if (ch !== ' ' && ch !== '\t' && ch !== '\f')
                return;
            ++this._pos;
        }
    }

    private _isLineBreak(pos: number) {
        if (pos >= this._end)
            return false;
        const ch = this._text[pos];
        return ch === '\n' || ch === '\r';
    }

    private _skipLineBreak(pos: number) {
        return this._text[pos] === '\r' && this._text[pos + 1] === '\n' ? pos + 2 : pos + 1;
    }

    private _lastToken(): Token | undefined {
        return this._tokens[this._tokens.length - 1];
    }

    private _push(kind: Exclude<TokenKind, TokenKind.String>, pos: number, end: number) {
        this._tokens.push({kind, text: this._text.slice(pos, end), pos, end});
        this._pos = end;
    }

    private _error(message: string, pos: number, end: number): never {
        throw new ParseError(message, this._fileName, createSourceSpan(this._lineStarts, pos, end));
    }
}
