export enum SyntaxKind {
    Module,

    ExpressionStatement,
    AssignmentStatement,
    AugmentedAssignment,
    AnnotatedAssignment,
    PassStatement,
    BreakStatement,
    ContinueStatement,
    ReturnStatement,
    DelStatement,
    RaiseStatement,
    AssertStatement,
    GlobalStatement,
    NonlocalStatement,
    ImportStatement,
    ImportFromStatement,
    PrintStatement,
    IfStatement,
    WhileStatement,
    ForStatement,
    TryStatement,
    WithStatement,
    FunctionDef,
    ClassDef,

    ImportAlias,
    ExceptClause,
    WithItem,
    Parameter,
    Argument,
    KeyValuePair,
    StringElement,
    Interpolation,
    ComprehensionFor,
    ComprehensionIf,

    Name,
    NumericLiteral,
    KeywordLiteral,
    StringLiteral,
    Tuple,
    ListLiteral,
    SetLiteral,
    DictLiteral,
    Parenthesized,
    Call,
    Attribute,
    Subscript,
    Slice,
    BinaryExpression,
    UnaryExpression,
    ConditionalExpression,
    Lambda,
    ListComprehension,
    SetComprehension,
    GeneratorExpression,
    DictComprehension,
    Starred,
    AssignmentExpression,
    YieldExpression,
    AwaitExpression,
}

export interface TextRange {
    pos: number;
    end: number;
}

export interface Comment extends TextRange {
    /** Comment text including the leading `#`. */
    text: string;
}

interface NodeBase<K extends SyntaxKind> extends TextRange {
    readonly kind: K;
    parent: Node | undefined;
}

export interface Module extends NodeBase<SyntaxKind.Module> {
    readonly fileName: string;
    readonly text: string;
    readonly lineStarts: readonly number[];
    readonly statements: readonly Statement[];
    readonly comments: readonly Comment[];
}

// Statements

export interface ExpressionStatement extends NodeBase<SyntaxKind.ExpressionStatement> {
    readonly expression: Expression;
}

/** `a = b = value`: every entry of `targets` is assigned `value`. */
export interface AssignmentStatement extends NodeBase<SyntaxKind.AssignmentStatement> {
    readonly targets: readonly Expression[];
    readonly value: Expression;
}

export interface AugmentedAssignment extends NodeBase<SyntaxKind.AugmentedAssignment> {
    readonly target: Expression;
    readonly operator: string;
    readonly value: Expression;
}

export interface AnnotatedAssignment extends NodeBase<SyntaxKind.AnnotatedAssignment> {
    readonly target: Expression;
    readonly annotation: Expression;
    readonly value: Expression | undefined;
}

export interface PassStatement extends NodeBase<SyntaxKind.PassStatement> {}
export interface BreakStatement extends NodeBase<SyntaxKind.BreakStatement> {}
export interface ContinueStatement extends NodeBase<SyntaxKind.ContinueStatement> {}

export interface ReturnStatement extends NodeBase<SyntaxKind.ReturnStatement> {
    readonly value: Expression | undefined;
}

export interface DelStatement extends NodeBase<SyntaxKind.DelStatement> {
    readonly targets: readonly Expression[];
}

export interface RaiseStatement extends NodeBase<SyntaxKind.RaiseStatement> {
    readonly exception: Expression | undefined;
    readonly cause: Expression | undefined;
}

export interface AssertStatement extends NodeBase<SyntaxKind.AssertStatement> {
    readonly condition: Expression;
    readonly message: Expression | undefined;
}

export interface GlobalStatement extends NodeBase<SyntaxKind.GlobalStatement> {
    readonly names: readonly Name[];
}

export interface NonlocalStatement extends NodeBase<SyntaxKind.NonlocalStatement> {
    readonly names: readonly Name[];
}

export interface ImportStatement extends NodeBase<SyntaxKind.ImportStatement> {
    readonly names: readonly ImportAlias[];
}

export interface ImportFromStatement extends NodeBase<SyntaxKind.ImportFromStatement> {
    /** Module path as written, including leading dots of relative imports. */
    readonly module: string;
    readonly names: readonly ImportAlias[];
    readonly wildcard: boolean;
}

/** Python 2 `print a, b` statement. */
export interface PrintStatement extends NodeBase<SyntaxKind.PrintStatement> {
    readonly destination: Expression | undefined;
    readonly values: readonly Expression[];
}

/** `elif` branches are represented as a nested IfStatement in `orelse`. */
export interface IfStatement extends NodeBase<SyntaxKind.IfStatement> {
    readonly condition: Expression;
    readonly body: readonly Statement[];
    readonly orelse: readonly Statement[];
}

export interface WhileStatement extends NodeBase<SyntaxKind.WhileStatement> {
    readonly condition: Expression;
    readonly body: readonly Statement[];
    readonly orelse: readonly Statement[];
}

export interface ForStatement extends NodeBase<SyntaxKind.ForStatement> {
    readonly isAsync: boolean;
    readonly target: Expression;
    readonly iterable: Expression;
    readonly body: readonly Statement[];
    readonly orelse: readonly Statement[];
}

export interface TryStatement extends NodeBase<SyntaxKind.TryStatement> {
    readonly body: readonly Statement[];
    readonly handlers: readonly ExceptClause[];
    readonly orelse: readonly Statement[];
    readonly finalbody: readonly Statement[];
}

export interface WithStatement extends NodeBase<SyntaxKind.WithStatement> {
    readonly isAsync: boolean;
    readonly items: readonly WithItem[];
    readonly body: readonly Statement[];
}

export interface FunctionDef extends NodeBase<SyntaxKind.FunctionDef> {
    readonly isAsync: boolean;
    readonly decorators: readonly Expression[];
    readonly name: Name;
    readonly parameters: readonly Parameter[];
    readonly returns: Expression | undefined;
    readonly body: readonly Statement[];
}

export interface ClassDef extends NodeBase<SyntaxKind.ClassDef> {
    readonly decorators: readonly Expression[];
    readonly name: Name;
    readonly arguments: readonly Argument[];
    readonly body: readonly Statement[];
}

// Helper nodes

export interface ImportAlias extends NodeBase<SyntaxKind.ImportAlias> {
    readonly path: readonly Name[];
    readonly alias: Name | undefined;
}

export interface ExceptClause extends NodeBase<SyntaxKind.ExceptClause> {
    readonly exception: Expression | undefined;
    readonly name: Name | undefined;
    readonly body: readonly Statement[];
}

export interface WithItem extends NodeBase<SyntaxKind.WithItem> {
    readonly expression: Expression;
    readonly target: Expression | undefined;
}

export type ParameterPrefix = '' | '*' | '**' | '/';

/** A bare `*` or `/` marker has no name. */
export interface Parameter extends NodeBase<SyntaxKind.Parameter> {
    readonly prefix: ParameterPrefix;
    readonly name: Name | undefined;
    readonly annotation: Expression | undefined;
    readonly defaultValue: Expression | undefined;
}

export interface Argument extends NodeBase<SyntaxKind.Argument> {
    readonly prefix: '' | '*' | '**';
    /** Keyword of a keyword argument. */
    readonly name: Name | undefined;
    readonly value: Expression;
}

export interface KeyValuePair extends NodeBase<SyntaxKind.KeyValuePair> {
    readonly key: Expression;
    readonly value: Expression;
}

export interface StringElement extends NodeBase<SyntaxKind.StringElement> {
    readonly prefix: string;
    readonly quote: string;
    /** Text between the quotes, escapes left as written. */
    readonly value: string;
    /** Replacement fields of an f-string, empty for every other string. */
    readonly interpolations: readonly Interpolation[];
}

export interface Interpolation extends NodeBase<SyntaxKind.Interpolation> {
    readonly expression: Expression;
    readonly conversion: string | undefined;
    readonly formatSpec: readonly Interpolation[];
}

export interface ComprehensionFor extends NodeBase<SyntaxKind.ComprehensionFor> {
    readonly isAsync: boolean;
    readonly target: Expression;
    readonly iterable: Expression;
}

export interface ComprehensionIf extends NodeBase<SyntaxKind.ComprehensionIf> {
    readonly condition: Expression;
}

export type ComprehensionClause = ComprehensionFor | ComprehensionIf;

// Expressions

export interface Name extends NodeBase<SyntaxKind.Name> {
    readonly text: string;
}

export interface NumericLiteral extends NodeBase<SyntaxKind.NumericLiteral> {
    readonly text: string;
}

export interface KeywordLiteral extends NodeBase<SyntaxKind.KeywordLiteral> {
    readonly text: 'None' | 'True' | 'False' | '...';
}

/** Implicitly concatenated string literals form one StringLiteral. */
export interface StringLiteral extends NodeBase<SyntaxKind.StringLiteral> {
    readonly elements: readonly StringElement[];
}

export interface Tuple extends NodeBase<SyntaxKind.Tuple> {
    readonly elements: readonly Expression[];
    readonly parenthesized: boolean;
}

export interface ListLiteral extends NodeBase<SyntaxKind.ListLiteral> {
    readonly elements: readonly Expression[];
}

export interface SetLiteral extends NodeBase<SyntaxKind.SetLiteral> {
    readonly elements: readonly Expression[];
}

export interface DictLiteral extends NodeBase<SyntaxKind.DictLiteral> {
    readonly entries: ReadonlyArray<KeyValuePair | Starred>;
}

export interface Parenthesized extends NodeBase<SyntaxKind.Parenthesized> {
    readonly expression: Expression;
}

export interface Call extends NodeBase<SyntaxKind.Call> {
    readonly callee: Expression;
    readonly arguments: readonly Argument[];
}

export interface Attribute extends NodeBase<SyntaxKind.Attribute> {
    readonly object: Expression;
    readonly name: Name;
}

export interface Subscript extends NodeBase<SyntaxKind.Subscript> {
    readonly object: Expression;
    readonly index: Expression;
}

export interface Slice extends NodeBase<SyntaxKind.Slice> {
    readonly lower: Expression | undefined;
    readonly upper: Expression | undefined;
    readonly step: Expression | undefined;
}

export interface BinaryExpression extends NodeBase<SyntaxKind.BinaryExpression> {
    readonly left: Expression;
    readonly operator: string;
    readonly right: Expression;
}

export interface UnaryExpression extends NodeBase<SyntaxKind.UnaryExpression> {
    readonly operator: string;
    readonly operand: Expression;
}

/** `whenTrue if condition else whenFalse` */
export interface ConditionalExpression extends NodeBase<SyntaxKind.ConditionalExpression> {
    readonly whenTrue: Expression;
    readonly condition: Expression;
    readonly whenFalse: Expression;
}

export interface Lambda extends NodeBase<SyntaxKind.Lambda> {
    readonly parameters: readonly Parameter[];
    readonly body: Expression;
}

export interface ComprehensionExpression<
    K extends SyntaxKind.ListComprehension | SyntaxKind.SetComprehension | SyntaxKind.GeneratorExpression =
        SyntaxKind.ListComprehension | SyntaxKind.SetComprehension | SyntaxKind.GeneratorExpression,
> extends NodeBase<K> {
    readonly element: Expression;
    readonly clauses: readonly ComprehensionClause[];
}

export type ListComprehension = ComprehensionExpression<SyntaxKind.ListComprehension>;
export type SetComprehension = ComprehensionExpression<SyntaxKind.SetComprehension>;
export type GeneratorExpression = ComprehensionExpression<SyntaxKind.GeneratorExpression>;

export interface DictComprehension extends NodeBase<SyntaxKind.DictComprehension> {
    readonly key: Expression;
    readonly value: Expression;
    readonly clauses: readonly ComprehensionClause[];
}

export interface Starred extends NodeBase<SyntaxKind.Starred> {
    readonly prefix: '*' | '**';
    readonly expression: Expression;
}

/** `name := value` */
export interface AssignmentExpression extends NodeBase<SyntaxKind.AssignmentExpression> {
    readonly name: Name;
    readonly value: Expression;
}

export interface YieldExpression extends NodeBase<SyntaxKind.YieldExpression> {
    readonly value: Expression | undefined;
    readonly delegate: boolean;
}

export interface AwaitExpression extends NodeBase<SyntaxKind.AwaitExpression> {
    readonly expression: Expression;
}

export type Statement =
    | ExpressionStatement
    | AssignmentStatement
    | AugmentedAssignment
    | AnnotatedAssignment
    | PassStatement
    | BreakStatement
    | ContinueStatement
    | ReturnStatement
    | DelStatement
    | RaiseStatement
    | AssertStatement
    | GlobalStatement
    | NonlocalStatement
    | ImportStatement
    | ImportFromStatement
    | PrintStatement
    | IfStatement
    | WhileStatement
    | ForStatement
    | TryStatement
    | WithStatement
    | FunctionDef
    | ClassDef;

export type AnyComprehension = ListComprehension | SetComprehension | GeneratorExpression | DictComprehension;

export type Expression =
    | Name
    | NumericLiteral
    | KeywordLiteral
    | StringLiteral
    | Tuple
    | ListLiteral
    | SetLiteral
    | DictLiteral
    | Parenthesized
    | Call
    | Attribute
    | Subscript
    | Slice
    | BinaryExpression
    | UnaryExpression
    | ConditionalExpression
    | Lambda
    | AnyComprehension
    | Starred
    | AssignmentExpression
    | YieldExpression
    | AwaitExpression;

export type Node =
    | Module
    | Statement
    | Expression
    | ImportAlias
    | ExceptClause
    | WithItem
    | Parameter
    | Argument
    | KeyValuePair
    | StringElement
    | Interpolation
    | ComprehensionFor
    | ComprehensionIf;

/** Nodes that may introduce a lexical scope. */
export type ScopeNode = Module | FunctionDef | ClassDef | Lambda | AnyComprehension;
