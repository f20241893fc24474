import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { DebugManager } from '../engine/src/debug';

export function makeWireSnapshot(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    fixture_id: 'fx-helper',
    home_team: 'Home Side',
    away_team: 'Away Side',
    minute: 60,
    home_score: 1,
    away_score: 0,
    home_xg: 1.1,
    away_xg: 0.7,
    shots: { home: 9, away: 6 },
    shots_on_target: { home: 4, away: 2 },
    corners: { home: 5, away: 3 },
    cards: { home: 1, away: 2 },
    red_cards: { home: 0, away: 0 },
    fouls: { home: 10, away: 12 },
    possession: { home: 55, away: 45 },
    dangerous_attacks: { home: 40, away: 30 },
    substitution_events: [],
    events: [
      { minute: 56, side: 'home', kind: 'shot' },
      { minute: 58, side: 'away', kind: 'dangerous_attack' },
      { minute: 59, side: 'home', kind: 'corner' },
    ],
    ...overrides,
  };
}

export function silentLogger(): DebugManager {
  return new DebugManager(500, 'SILENT');
}

export function readFixture(name: string): unknown {
  const path = fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parsed;
}
