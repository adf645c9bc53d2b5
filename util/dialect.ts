import { z } from 'zod';
import { ConfigurationError } from './errors';

export const ReflectiveCallSchema = z.object({
    /** Name of the called function, e.g. `locals`. */
    callee: z.string().min(1),
    /** Number of arguments the call must have to match. Any number if omitted. */
    arity: z.number().int().nonnegative().optional(),
});

export type ReflectiveCall = z.infer<typeof ReflectiveCallSchema>;

export const DialectSchema = z.object({
    name: z.string().min(1),
    /** Whether each kind of comprehension introduces its own scope. */
    comprehensionScoping: z.object({
        list: z.boolean(),
        set: z.boolean(),
        dict: z.boolean(),
        generator: z.boolean(),
    }),
    reflectiveCalls: z.array(ReflectiveCallSchema),
});

export type Dialect = z.infer<typeof DialectSchema>;

const REFLECTIVE_CALLS: ReflectiveCall[] = [
    {callee: 'locals'},
    {callee: 'vars', arity: 0},
];

export const python3: Dialect = {
    name: 'python3',
    comprehensionScoping: {list: true, set: true, dict: true, generator: true},
    reflectiveCalls: REFLECTIVE_CALLS,
};

/** List comprehensions leak their targets into the enclosing scope. */
export const python2: Dialect = {
    name: 'python2',
    comprehensionScoping: {list: false, set: true, dict: true, generator: true},
    reflectiveCalls: REFLECTIVE_CALLS,
};

export const dialects = {python3, python2};

export type DialectName = keyof typeof dialects;

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.length === 0 ? '<root>' : issue.path.join('.')}: ${issue.message}`);
}

/** Validates a dialect configuration. Throws a ConfigurationError if it is invalid. */
export function parseDialect(value: unknown): Dialect {
    const result = DialectSchema.safeParse(value);
    if (!result.success)
        throw new ConfigurationError('Invalid dialect', formatIssues(result.error));
    return result.data;
}
