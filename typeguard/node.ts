import { SyntaxKind } from '../syntax/types';
import type * as py from '../syntax/types';

export function isAnnotatedAssignment(node: py.Node): node is py.AnnotatedAssignment {
    return node.kind === SyntaxKind.AnnotatedAssignment;
}

export function isArgument(node: py.Node): node is py.Argument {
    return node.kind === SyntaxKind.Argument;
}

export function isAssertStatement(node: py.Node): node is py.AssertStatement {
    return node.kind === SyntaxKind.AssertStatement;
}

export function isAssignmentExpression(node: py.Node): node is py.AssignmentExpression {
    return node.kind === SyntaxKind.AssignmentExpression;
}

export function isAssignmentStatement(node: py.Node): node is py.AssignmentStatement {
    return node.kind === SyntaxKind.AssignmentStatement;
}

export function isAttribute(node: py.Node): node is py.Attribute {
    return node.kind === SyntaxKind.Attribute;
}

export function isAugmentedAssignment(node: py.Node): node is py.AugmentedAssignment {
    return node.kind === SyntaxKind.AugmentedAssignment;
}

export function isAwaitExpression(node: py.Node): node is py.AwaitExpression {
    return node.kind === SyntaxKind.AwaitExpression;
}

export function isBinaryExpression(node: py.Node): node is py.BinaryExpression {
    return node.kind === SyntaxKind.BinaryExpression;
}

export function isCall(node: py.Node): node is py.Call {
    return node.kind === SyntaxKind.Call;
}

export function isClassDef(node: py.Node): node is py.ClassDef {
    return node.kind === SyntaxKind.ClassDef;
}

export function isComprehension(node: py.Node): node is py.AnyComprehension {
    switch (node.kind) {
        case SyntaxKind.ListComprehension:
        case SyntaxKind.SetComprehension:
        case SyntaxKind.GeneratorExpression:
        case SyntaxKind.DictComprehension:
            return true;
        default:
            return false;
    }
}

export function isComprehensionClause(node: py.Node): node is py.ComprehensionClause {
    return node.kind === SyntaxKind.ComprehensionFor ||
        node.kind === SyntaxKind.ComprehensionIf;
}

export function isComprehensionFor(node: py.Node): node is py.ComprehensionFor {
    return node.kind === SyntaxKind.ComprehensionFor;
}

export function isComprehensionIf(node: py.Node): node is py.ComprehensionIf {
    return node.kind === SyntaxKind.ComprehensionIf;
}

export function isConditionalExpression(node: py.Node): node is py.ConditionalExpression {
    return node.kind === SyntaxKind.ConditionalExpression;
}

export function isDelStatement(node: py.Node): node is py.DelStatement {
    return node.kind === SyntaxKind.DelStatement;
}

export function isDictComprehension(node: py.Node): node is py.DictComprehension {
    return node.kind === SyntaxKind.DictComprehension;
}

export function isDictLiteral(node: py.Node): node is py.DictLiteral {
    return node.kind === SyntaxKind.DictLiteral;
}

export function isExceptClause(node: py.Node): node is py.ExceptClause {
    return node.kind === SyntaxKind.ExceptClause;
}

export function isExpressionStatement(node: py.Node): node is py.ExpressionStatement {
    return node.kind === SyntaxKind.ExpressionStatement;
}

export function isForStatement(node: py.Node): node is py.ForStatement {
    return node.kind === SyntaxKind.ForStatement;
}

export function isFunctionDef(node: py.Node): node is py.FunctionDef {
    return node.kind === SyntaxKind.FunctionDef;
}

export function isFunctionLike(node: py.Node): node is py.FunctionDef | py.Lambda {
    return node.kind === SyntaxKind.FunctionDef ||
        node.kind === SyntaxKind.Lambda;
}

export function isGeneratorExpression(node: py.Node): node is py.GeneratorExpression {
    return node.kind === SyntaxKind.GeneratorExpression;
}

export function isGlobalStatement(node: py.Node): node is py.GlobalStatement {
    return node.kind === SyntaxKind.GlobalStatement;
}

export function isIfStatement(node: py.Node): node is py.IfStatement {
    return node.kind === SyntaxKind.IfStatement;
}

export function isImportAlias(node: py.Node): node is py.ImportAlias {
    return node.kind === SyntaxKind.ImportAlias;
}

export function isImportFromStatement(node: py.Node): node is py.ImportFromStatement {
    return node.kind === SyntaxKind.ImportFromStatement;
}

export function isImportStatement(node: py.Node): node is py.ImportStatement {
    return node.kind === SyntaxKind.ImportStatement;
}

export function isInterpolation(node: py.Node): node is py.Interpolation {
    return node.kind === SyntaxKind.Interpolation;
}

export function isKeyValuePair(node: py.Node): node is py.KeyValuePair {
    return node.kind === SyntaxKind.KeyValuePair;
}

export function isKeywordLiteral(node: py.Node): node is py.KeywordLiteral {
    return node.kind === SyntaxKind.KeywordLiteral;
}

export function isLambda(node: py.Node): node is py.Lambda {
    return node.kind === SyntaxKind.Lambda;
}

export function isListComprehension(node: py.Node): node is py.ListComprehension {
    return node.kind === SyntaxKind.ListComprehension;
}

export function isListLiteral(node: py.Node): node is py.ListLiteral {
    return node.kind === SyntaxKind.ListLiteral;
}

export function isModule(node: py.Node): node is py.Module {
    return node.kind === SyntaxKind.Module;
}

export function isName(node: py.Node): node is py.Name {
    return node.kind === SyntaxKind.Name;
}

export function isNonlocalStatement(node: py.Node): node is py.NonlocalStatement {
    return node.kind === SyntaxKind.NonlocalStatement;
}

export function isNumericLiteral(node: py.Node): node is py.NumericLiteral {
    return node.kind === SyntaxKind.NumericLiteral;
}

export function isParameter(node: py.Node): node is py.Parameter {
    return node.kind === SyntaxKind.Parameter;
}

export function isParenthesized(node: py.Node): node is py.Parenthesized {
    return node.kind === SyntaxKind.Parenthesized;
}

export function isPrintStatement(node: py.Node): node is py.PrintStatement {
    return node.kind === SyntaxKind.PrintStatement;
}

export function isRaiseStatement(node: py.Node): node is py.RaiseStatement {
    return node.kind === SyntaxKind.RaiseStatement;
}

export function isReturnStatement(node: py.Node): node is py.ReturnStatement {
    return node.kind === SyntaxKind.ReturnStatement;
}

/** Returns true for nodes that may introduce a lexical scope. */
export function isScopeNode(node: py.Node): node is py.ScopeNode {
    return node.kind === SyntaxKind.Module ||
        node.kind === SyntaxKind.FunctionDef ||
        node.kind === SyntaxKind.ClassDef ||
        node.kind === SyntaxKind.Lambda ||
        isComprehension(node);
}

export function isSetComprehension(node: py.Node): node is py.SetComprehension {
    return node.kind === SyntaxKind.SetComprehension;
}

export function isSetLiteral(node: py.Node): node is py.SetLiteral {
    return node.kind === SyntaxKind.SetLiteral;
}

export function isSlice(node: py.Node): node is py.Slice {
    return node.kind === SyntaxKind.Slice;
}

export function isStarred(node: py.Node): node is py.Starred {
    return node.kind === SyntaxKind.Starred;
}

export function isStringElement(node: py.Node): node is py.StringElement {
    return node.kind === SyntaxKind.StringElement;
}

export function isStringLiteral(node: py.Node): node is py.StringLiteral {
    return node.kind === SyntaxKind.StringLiteral;
}

export function isSubscript(node: py.Node): node is py.Subscript {
    return node.kind === SyntaxKind.Subscript;
}

export function isTryStatement(node: py.Node): node is py.TryStatement {
    return node.kind === SyntaxKind.TryStatement;
}

export function isTuple(node: py.Node): node is py.Tuple {
    return node.kind === SyntaxKind.Tuple;
}

/** Destructuring target: `a, b`, `(a, b)` or `[a, b]`. */
export function isTupleOrList(node: py.Node): node is py.Tuple | py.ListLiteral {
    return node.kind === SyntaxKind.Tuple ||
        node.kind === SyntaxKind.ListLiteral;
}

export function isUnaryExpression(node: py.Node): node is py.UnaryExpression {
    return node.kind === SyntaxKind.UnaryExpression;
}

export function isWhileStatement(node: py.Node): node is py.WhileStatement {
    return node.kind === SyntaxKind.WhileStatement;
}

export function isWithItem(node: py.Node): node is py.WithItem {
    return node.kind === SyntaxKind.WithItem;
}

export function isWithStatement(node: py.Node): node is py.WithStatement {
    return node.kind === SyntaxKind.WithStatement;
}

export function isYieldExpression(node: py.Node): node is py.YieldExpression {
    return node.kind === SyntaxKind.YieldExpression;
}
