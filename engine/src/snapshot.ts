/**
 * Live Market Engine - Snapshot Schema
 * Zod schema for the live-data collaborator's payload.
 *
 * Feeds drop fields, send nulls and stringify numbers ("55%", "1.2").
 * Every numeric field is coerced to a finite, non-negative number here so
 * nothing downstream ever does arithmetic on null.
 */

import { z } from 'zod';
import type { MatchEvent, MatchSnapshot, SubstitutionEvent } from './types';

// ═══════════════════════════════════════════════════════════════════════════
// §1  COERCION
// ═══════════════════════════════════════════════════════════════════════════

export function toCount(value: unknown): number {
    if (value === null || value === undefined || typeof value === 'boolean') return 0;
    const n = typeof value === 'number' ? value : parseFloat(String(value));
    if (!Number.isFinite(n) || n < 0) return 0;
    return n;
}

function asRecord(value: unknown): Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        ? Object.fromEntries(Object.entries(value))
        : {};
}

const count = z.preprocess(toCount, z.number());

const SidePairSchema = z.preprocess(asRecord, z.object({
    home: count,
    away: count
}));

const SideSchema = z.enum(['home', 'away']);

const MatchEventSchema = z.object({
    minute: z.coerce.number().finite().min(0),
    side: SideSchema,
    kind: z.enum(['shot', 'dangerous_attack', 'corner', 'goal', 'card', 'substitution'])
});

const SubstitutionEventSchema = z.object({
    minute: z.coerce.number().finite().min(0),
    side: SideSchema,
    offensive: z.boolean().optional()
});

/** Keeps only the entries that parse; a malformed event never sinks the snapshot */
function listOf<T>(schema: z.ZodType<T>) {
    return z.preprocess(
        value => (Array.isArray(value) ? value : []),
        z.array(z.unknown()).transform(items =>
            items.flatMap(item => {
                const parsed = schema.safeParse(item);
                return parsed.success ? [parsed.data] : [];
            })
        )
    );
}

// ═══════════════════════════════════════════════════════════════════════════
// §2  WIRE SCHEMA (what the live-data collaborator sends)
// ═══════════════════════════════════════════════════════════════════════════

export const MatchSnapshotSchema = z.preprocess(asRecord, z.object({
    fixture_id: z.preprocess(
        v => (typeof v === 'string' || typeof v === 'number' ? String(v) : 'unknown'),
        z.string()
    ),
    home_team: z.string().optional().catch(undefined),
    away_team: z.string().optional().catch(undefined),
    minute: count,
    home_score: count,
    away_score: count,
    home_xg: count,
    away_xg: count,
    shots: SidePairSchema,
    shots_on_target: SidePairSchema,
    corners: SidePairSchema,
    cards: SidePairSchema,
    red_cards: SidePairSchema,
    fouls: SidePairSchema,
    possession: SidePairSchema,
    dangerous_attacks: SidePairSchema,
    substitution_events: listOf<SubstitutionEvent>(SubstitutionEventSchema),
    events: listOf<MatchEvent>(MatchEventSchema)
}));

export type MatchSnapshotWire = z.infer<typeof MatchSnapshotSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// §3  PARSING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse any payload into a frozen MatchSnapshot. Never throws:
 * unknown or malformed numbers become zero.
 */
export function parseSnapshot(raw: unknown): MatchSnapshot {
    const wire = MatchSnapshotSchema.parse(raw);

    return Object.freeze({
        fixtureId: wire.fixture_id,
        homeTeam: wire.home_team,
        awayTeam: wire.away_team,
        minute: wire.minute,
        homeScore: Math.floor(wire.home_score),
        awayScore: Math.floor(wire.away_score),
        homeXg: wire.home_xg,
        awayXg: wire.away_xg,
        shots: wire.shots,
        shotsOnTarget: wire.shots_on_target,
        corners: wire.corners,
        cards: wire.cards,
        redCards: wire.red_cards,
        fouls: wire.fouls,
        possession: wire.possession,
        dangerousAttacks: wire.dangerous_attacks,
        substitutionEvents: wire.substitution_events,
        events: wire.events
    });
}
