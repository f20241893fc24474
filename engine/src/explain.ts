/**
 * Live Market Engine - Explain Module
 * Plain-text summary of one evaluated snapshot for logs and the CLI
 */

import type { MatchReport } from './evaluate';
import type { RankedBet } from './selector';

export function formatProbability(probability: number): string {
    return `${probability.toFixed(1)}%`;
}

/**
 * "Total Goals Over 2.5 @ 64.2% (fair 1.56, MEDIUM)"
 */
export function describeBet(bet: RankedBet): string {
    const odds = bet.fairOdds === null ? 'n/a' : bet.fairOdds.toFixed(2);
    return `${bet.marketName} ${bet.selection} @ ${formatProbability(bet.probability)} (fair ${odds}, ${bet.confidenceTier})`;
}

export function explainReport(report: MatchReport): string[] {
    const lines: string[] = [];
    const { projection, phase, momentum, selection } = report;

    lines.push(`Fixture ${report.fixtureId} @ ${report.minute}'`);
    lines.push(
        `Phase ${phase.phase} (urgency ${phase.urgency}, bias ${phase.bias >= 0 ? '+' : ''}${phase.bias}pp)`
        + ` | momentum ${formatProbability(momentum.momentumRatioHome * 100)} home`
    );
    lines.push(
        `Expected remaining goals ${projection.homeExpectedRemaining.toFixed(2)} - ${projection.awayExpectedRemaining.toFixed(2)}`
        + ` (${projection.source}${projection.reliable ? '' : ', early-game default'})`
    );

    const red = projection.redCardMultiplier;
    if (red.home !== 1 || red.away !== 1) {
        lines.push(`Red card: goal rates x${red.home.toFixed(2)} home, x${red.away.toFixed(2)} away`);
    }

    const likeliest = report.correctScores[0];
    if (likeliest) {
        lines.push(`Most likely final score ${likeliest.home}-${likeliest.away} (${formatProbability(likeliest.probability * 100)})`);
    }

    if (selection.best) {
        lines.push(`Best: ${describeBet(selection.best)}`);
        lines.push(`  ${selection.best.rationale}`);
    } else {
        lines.push('Best: none');
    }

    selection.topN.forEach((bet, i) => {
        lines.push(`${i + 1}. ${describeBet(bet)}`);
    });

    for (const failure of report.failures) {
        lines.push(`! ${failure.market} failed: ${failure.message}`);
    }
    return lines;
}
