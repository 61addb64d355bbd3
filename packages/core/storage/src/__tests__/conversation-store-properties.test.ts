import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import type { Logger, NewTurn, SourceAttribution } from '@campaign-agent/shared';
import { SqliteAdapter } from '../sqlite.js';
import { ConversationStore } from '../conversation-store.js';
import { MigrationRunner } from '../migrations/migration-runner.js';

const silentLogger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
};

const THREAD = 'thread-p';

async function withStore(run: (store: ConversationStore) => Promise<void>): Promise<void> {
    const adapter = new SqliteAdapter({ filename: ':memory:' });
    try {
        await new MigrationRunner({ adapter, logger: silentLogger }).up();
        await run(new ConversationStore({ adapter, logger: silentLogger }));
    } finally {
        await adapter.close();
    }
}

const timestampArb = fc
    .integer({ min: Date.UTC(2020, 0, 1), max: Date.UTC(2030, 0, 1) })
    .map(ms => new Date(ms).toISOString());

const attributionArb: fc.Arbitrary<SourceAttribution> = fc.oneof(
    fc.record({ source_kind: fc.constant('structured' as const), source_ref: fc.string({ minLength: 1 }) }),
    fc.record({
        source_kind: fc.constant('document' as const),
        source_ref: fc.string({ minLength: 1 }),
        score: fc.integer({ min: 0, max: 100 }).map(n => n / 100),
    })
);

const turnArb: fc.Arbitrary<NewTurn> = fc
    .record({
        user_id: fc.option(fc.constantFrom('user-1', 'user-2'), { nil: null }),
        role: fc.constantFrom('user' as const, 'assistant' as const),
        content: fc.string(),
        response_type: fc.constantFrom('text' as const, 'error' as const),
        source_attributions: fc.array(attributionArb, { maxLength: 3 }),
        input: fc.nat({ max: 5000 }),
        output: fc.nat({ max: 5000 }),
        timestamp: timestampArb,
    })
    .map(spec => ({
        thread_id: THREAD,
        user_id: spec.user_id,
        role: spec.role,
        content: spec.content,
        response_type: spec.response_type,
        source_attributions: spec.source_attributions,
        token_usage: { input: spec.input, output: spec.output, total: spec.input + spec.output },
        payload: null,
        timestamp: spec.timestamp,
    }));

describe('ConversationStore Property Tests', () => {
    // Appended turns come back unchanged, in order, under strictly increasing ids
    it('should round-trip any append sequence in order', async () => {
        await fc.assert(
            fc.asyncProperty(fc.array(turnArb, { minLength: 1, maxLength: 8 }), async turns => {
                await withStore(async store => {
                    const ids: number[] = [];
                    for (const turn of turns) {
                        const appended = await store.append(THREAD, turn);
                        if (!appended.ok) throw new Error('append failed');
                        ids.push(appended.value);
                    }

                    const listed = await store.listRecent(THREAD, 500, { includeAllTypes: true });

                    expect(listed).toEqual({
                        ok: true,
                        value: turns.map((turn, index) => ({ ...turn, turn_id: ids[index] })),
                    });
                    ids.slice(1).forEach((id, index) => expect(id).toBeGreaterThan(ids[index] ?? Infinity));
                });
            }),
            { numRuns: 25 }
        );
    });

    // Reading twice without writes in between gives the same answer
    it('should return the same recent turns when replayed', async () => {
        await fc.assert(
            fc.asyncProperty(
                fc.array(turnArb, { minLength: 0, maxLength: 8 }),
                fc.nat({ max: 10 }),
                async (turns, limit) => {
                    await withStore(async store => {
                        for (const turn of turns) {
                            const appended = await store.append(THREAD, turn);
                            if (!appended.ok) throw new Error('append failed');
                        }

                        const first = await store.listRecent(THREAD, limit);
                        const second = await store.listRecent(THREAD, limit);

                        expect(second).toEqual(first);
                        expect(first.ok && first.value.length).toBe(
                            Math.min(limit, turns.filter(turn => turn.response_type === 'text').length)
                        );
                    });
                }
            ),
            { numRuns: 25 }
        );
    });

    // Each exchange lands as an adjacent user/assistant pair
    it('should keep every exchange paired', async () => {
        await fc.assert(
            fc.asyncProperty(fc.array(fc.tuple(turnArb, turnArb), { minLength: 1, maxLength: 5 }), async pairs => {
                await withStore(async store => {
                    for (const [question, answer] of pairs) {
                        const appended = await store.appendExchange(THREAD, [
                            { ...question, role: 'user' },
                            { ...answer, role: 'assistant' },
                        ]);
                        if (!appended.ok) throw new Error('append failed');
                        expect(appended.value[1].turn_id).toBe(appended.value[0].turn_id + 1);
                    }

                    const history = await store.listHistory(THREAD, { limit: 500 });
                    if (!history.ok) throw new Error('history failed');

                    expect(history.value.map(turn => turn.role)).toEqual(
                        pairs.flatMap(() => ['user', 'assistant'])
                    );
                });
            }),
            { numRuns: 25 }
        );
    });
});
