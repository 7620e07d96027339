import { describe, it, expect } from 'vitest';
import { NameInvalid, NameTooLong, PropertyInvalid } from '../src/Classifier/Failures.js';
import { Decide, FirstMatch, On, OnIf, type Rule, type StatusContext } from '../src/Classifier/Rules.js';

interface Context extends StatusContext {
    name: string;
}

const RULES: readonly Rule<Context>[] = [
    OnIf(22, ctx => ctx.name === '', ctx => new NameInvalid(ctx.name)),
    OnIf(22, ctx => ctx.name.length > 3, ctx => new NameTooLong(ctx.name)),
    On(22, ctx => new PropertyInvalid(ctx.name)),
];

describe('Rules', () => {
    it('returns the first matching outcome in list order', () => {
        expect(FirstMatch(RULES, { status: 22, name: '' })).toBeInstanceOf(NameInvalid);
        expect(FirstMatch(RULES, { status: 22, name: 'long' })).toBeInstanceOf(NameTooLong);
        expect(FirstMatch(RULES, { status: 22, name: 'ok' })).toBeInstanceOf(PropertyInvalid);
    });

    it('ignores rules for other statuses', () => {
        expect(FirstMatch(RULES, { status: 17, name: '' })).toBeUndefined();
    });

    it('falls back when nothing matched', () => {
        const failure = Decide(RULES, { status: 17, name: 'x' }, ctx => new NameInvalid(`fallback ${ctx.name}`));
        expect(failure.target).toBe('fallback x');
    });
});
