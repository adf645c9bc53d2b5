import { z } from 'zod';
import { parseModule } from '../syntax/parser';
import { getLineAndCharacterOfPosition, LineAndCharacter } from '../syntax/position';
import type { Module } from '../syntax/types';
import { Dialect, dialects, DialectSchema, formatIssues } from '../util/dialect';
import { ConfigurationError } from '../util/errors';
import { evaluateLiveness, UNUSED_LOCAL_VARIABLE_RULE } from '../util/liveness';
import { Logger, silentLogger } from '../util/logger';
import { ScopeKind } from '../util/scope';
import { buildScopes } from '../util/scope-builder';
import { resolveUsages } from '../util/usage';

export const RuleOptionsSchema = z.object({
    /** Name of a shipped dialect or a custom dialect. */
    dialect: z.union([z.enum(['python3', 'python2']), DialectSchema]).default('python3'),
    ignoredNames: z.array(z.string()).default(['_']),
    reportParameters: z.boolean().default(false),
}).strict();

export type RuleOptions = z.input<typeof RuleOptionsSchema>;

export interface RuleFailure {
    ruleName: string;
    message: string;
    pos: number;
    end: number;
    startPosition: LineAndCharacter;
    endPosition: LineAndCharacter;
}

export class UnusedLocalVariableRule {
    public static readonly ruleName = UNUSED_LOCAL_VARIABLE_RULE;

    public readonly dialect: Dialect;
    private readonly _ignoredNames: readonly string[];
    private readonly _reportParameters: boolean;

    constructor(options: unknown = {}, private readonly _logger: Logger = silentLogger) {
        const result = RuleOptionsSchema.safeParse(options);
        if (!result.success)
            throw new ConfigurationError(`Invalid options for rule '${UnusedLocalVariableRule.ruleName}'`, formatIssues(result.error));
        const {dialect, ignoredNames, reportParameters} = result.data;
        this.dialect = typeof dialect === 'string' ? dialects[dialect] : dialect;
        this._ignoredNames = ignoredNames;
        this._reportParameters = reportParameters;
    }

    public apply(module: Module): RuleFailure[] {
        const scopeTree = buildScopes(module, this.dialect);
        const usages = resolveUsages(module, scopeTree);
        this._logger.debug(`analyzed ${module.fileName}`, {dialect: this.dialect.name, scopes: scopeTree.size, usages: usages.length});
        for (const scope of scopeTree.getScopes()) {
            // module and class scopes are never reported anyway
            if (!scope.reflective || scope.kind === ScopeKind.Module || scope.kind === ScopeKind.Class)
                continue;
            const {line} = getLineAndCharacterOfPosition(module.lineStarts, scope.node.pos);
            this._logger.debug(`scope at ${module.fileName}:${line + 1} is accessed reflectively, its bindings are not reported`);
        }
        const findings = evaluateLiveness(scopeTree, {
            ignoredNames: this._ignoredNames,
            reportParameters: this._reportParameters,
            ruleName: UnusedLocalVariableRule.ruleName,
        });
        return findings.map(({ruleName, message, span}) => ({
            ruleName,
            message,
            pos: span.pos,
            end: span.end,
            startPosition: span.startPosition,
            endPosition: span.endPosition,
        }));
    }

    public applyToText(text: string, fileName?: string): RuleFailure[] {
        return this.apply(parseModule(text, fileName));
    }
}
