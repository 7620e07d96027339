/**
 * Prioritized rule lists: the first rule whose status and predicate match decides the failure.
 * Order in the list is the precedence; there is no lookup by key.
 */
import type { ZfsError } from './Failures.js';

/** Minimum context every rule sees. */
export interface StatusContext {
    status: number;
}

export type Predicate<C> = (ctx: C) => boolean;
export type Outcome<C> = (ctx: C) => ZfsError;

export interface Rule<C extends StatusContext> {
    status: number;
    when?: Predicate<C>;
    then: Outcome<C>;
}

/** Rule matching a status unconditionally. */
export function On<C extends StatusContext>(status: number, then: Outcome<C>): Rule<C> {
    return { status, then };
}

/** Rule matching a status only while `when` holds. */
export function OnIf<C extends StatusContext>(status: number, when: Predicate<C>, then: Outcome<C>): Rule<C> {
    return { status, when, then };
}

/**
 * Runs the rules in order.
 * @returns ZfsError | undefined - Outcome of the first match, undefined when none matched
 */
export function FirstMatch<C extends StatusContext>(rules: readonly Rule<C>[], ctx: C): ZfsError | undefined {
    for (const rule of rules) {
        if (rule.status === ctx.status && (!rule.when || rule.when(ctx))) {
            return rule.then(ctx);
        }
    }
    return undefined;
}

/** Runs the rules in order and falls back when none matched. */
export function Decide<C extends StatusContext>(rules: readonly Rule<C>[], ctx: C, fallback: Outcome<C>): ZfsError {
    return FirstMatch(rules, ctx) ?? fallback(ctx);
}
