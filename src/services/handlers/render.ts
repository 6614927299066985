/**
 * Text renderings of games, records and previews.
 */

import type { GameWinner, ScheduledGame } from '../../types/models.js';
import { toNumber } from '../../types/utils.js';
import { describeDate } from '../../utils/dates.js';
import type { GamePreview, GameRecord, LineupEntry, PitcherLine } from '../game-center.js';
import type { TeamDirectory } from '../teams.js';

type Loose = string | number | null | undefined;

function shown(value: Loose, fallback = '-'): string {
  return value === null || value === undefined || value === '' ? fallback : String(value);
}

export function teamLabel(teams: TeamDirectory, code: string, fallback: string): string {
  return teams.get(code)?.name ?? (fallback || code);
}

export function startTime(game: ScheduledGame): string {
  const match = /(\d{1,2}):(\d{2})/.exec(game.startsAt ?? '');
  return match ? `${match[1].padStart(2, '0')}:${match[2]}` : 'time TBD';
}

const STATUS_LABELS: Record<string, string> = {
  BEFORE: 'scheduled',
  LIVE: 'in progress',
  RESULT: 'final',
  CANCEL: 'cancelled',
};

export function statusLabel(status: string): string {
  return STATUS_LABELS[status] ?? status.toLowerCase();
}

export function winnerSide(game: ScheduledGame): GameWinner | null {
  if (game.winner) return game.winner;
  if (game.homeScore === null || game.awayScore === null) return null;
  if (game.homeScore === game.awayScore) return 'DRAW';
  return game.homeScore > game.awayScore ? 'HOME' : 'AWAY';
}

/**
 * One line per game from schedule data alone.
 */
export function basicSummary(game: ScheduledGame, teams: TeamDirectory): string {
  const home = teamLabel(teams, game.homeCode, game.homeName);
  const away = teamLabel(teams, game.awayCode, game.awayName);

  if (game.status === 'RESULT' && game.homeScore !== null && game.awayScore !== null) {
    const side = winnerSide(game);
    const outcome = side === 'HOME' ? `${home} won` : side === 'AWAY' ? `${away} won` : 'tie';
    return `${away} ${game.awayScore} : ${game.homeScore} ${home} at ${game.stadium} (final, ${outcome})`;
  }
  if (game.status === 'CANCEL') {
    return `${away} vs ${home} at ${game.stadium} (cancelled)`;
  }
  return `${away} vs ${home} at ${game.stadium}, ${startTime(game)} (${statusLabel(game.status)})`;
}

/**
 * How a team's runs were spread over the innings: early is 1-3,
 * middle 4-6 and late 7 on.
 */
export function scoringPattern(innings: readonly Loose[]): string {
  if (innings.length === 0) return 'has no inning data';

  const scoring = innings
    .map((runs, i) => ((toNumber(runs ?? null) ?? 0) > 0 ? i + 1 : 0))
    .filter((inning) => inning > 0);

  if (scoring.length === 0) return 'did not score';
  if (scoring.length === 1) return `scored only in inning ${scoring[0]}`;

  const early = scoring.some((inning) => inning <= 3);
  const middle = scoring.some((inning) => inning >= 4 && inning <= 6);
  const late = scoring.some((inning) => inning >= 7);

  if (early && !middle && !late) return 'scored early (innings 1-3)';
  if (late && !early && !middle) return 'scored late (inning 7 on)';
  if (early && late) return 'scored early and late';
  return 'spread their scoring';
}

/**
 * "6 2/3" -> 6.667, "7" -> 7
 */
export function inningsPitched(value: Loose): number {
  if (typeof value === 'number') return value;
  const match = /^(\d+)?(?:\s*(\d)\/3)?$/.exec((value ?? '').trim());
  if (!match) return 0;
  return Number(match[1] ?? 0) + Number(match[2] ?? 0) / 3;
}

/**
 * The pitcher who threw the most innings.
 */
export function starterOf(lines: readonly PitcherLine[]): PitcherLine | null {
  let best: PitcherLine | null = null;
  for (const line of lines) {
    if (!best || inningsPitched(line.inn) > inningsPitched(best.inn)) {
      best = line;
    }
  }
  return best;
}

export function recordSummary(record: GameRecord, game: ScheduledGame, teams: TeamDirectory): string {
  const home = teamLabel(teams, game.homeCode, record.gameInfo.hFullName ?? game.homeName);
  const away = teamLabel(teams, game.awayCode, record.gameInfo.aFullName ?? game.awayName);
  const homeRuns = toNumber(record.scoreBoard.rheb?.home?.r ?? null) ?? game.homeScore ?? 0;
  const awayRuns = toNumber(record.scoreBoard.rheb?.away?.r ?? null) ?? game.awayScore ?? 0;
  const stadium = record.gameInfo.stadium ?? game.stadium;

  const lines = [`${away} ${awayRuns} : ${homeRuns} ${home} at ${stadium} (${describeDate(game.date)})`];

  if (homeRuns === awayRuns) {
    lines.push(`The game ended in a ${homeRuns}-${awayRuns} tie.`);
  } else {
    const [winner, high, low] =
      homeRuns > awayRuns ? [home, homeRuns, awayRuns] : [away, awayRuns, homeRuns];
    lines.push(`${winner} won ${high}-${low}.`);
  }

  const innings = record.scoreBoard.inn;
  lines.push(
    `Scoring: ${away} ${scoringPattern(innings?.away ?? [])}; ${home} ${scoringPattern(innings?.home ?? [])}.`
  );

  const awayStarter = starterOf(record.pitchersBoxscore.away ?? []);
  const homeStarter = starterOf(record.pitchersBoxscore.home ?? []);
  if (awayStarter?.name && homeStarter?.name) {
    lines.push(
      `Starters: ${away} ${awayStarter.name} (${shown(awayStarter.inn)} IP) vs ${home} ${homeStarter.name} (${shown(homeStarter.inn)} IP).`
    );
  }

  const homeRunHitters = record.etcRecords.filter((r) => r.how === '홈런').map((r) => r.result);
  if (homeRunHitters.length > 0) {
    lines.push(`Home runs: ${homeRunHitters.join(', ')}.`);
  }
  const winningHits = record.etcRecords.filter((r) => r.how === '결승타').map((r) => r.result);
  if (winningHits.length > 0) {
    lines.push(`Game-winning hit: ${winningHits.join(', ')}.`);
  }

  return lines.join('\n');
}

function lineup(entries: readonly LineupEntry[]): string {
  return entries
    .filter((entry) => entry.playerName)
    .map((entry, i) => `${shown(entry.batorder, String(i + 1))}. ${entry.playerName} (${shown(entry.positionName)})`)
    .join(', ');
}

export function previewSummary(preview: GamePreview, game: ScheduledGame, teams: TeamDirectory): string {
  const home = teamLabel(teams, game.homeCode, preview.gameInfo.hFullName ?? game.homeName);
  const away = teamLabel(teams, game.awayCode, preview.gameInfo.aFullName ?? game.awayName);
  const lines = [
    `${away} at ${home}, ${preview.gameInfo.stadium ?? game.stadium}, ${describeDate(game.date)} ${startTime(game)}`,
  ];

  const homeStanding = preview.homeStandings;
  const awayStanding = preview.awayStandings;
  if (homeStanding && awayStanding) {
    lines.push(
      `Standings: ${away} #${shown(awayStanding.rank)} (${shown(awayStanding.w)}-${shown(awayStanding.l)}, ${shown(awayStanding.wra)}) vs ${home} #${shown(homeStanding.rank)} (${shown(homeStanding.w)}-${shown(homeStanding.l)}, ${shown(homeStanding.wra)}).`
    );
  }

  const starter = (s: GamePreview['homeStarter']): string =>
    s?.playerInfo?.name
      ? `${s.playerInfo.name} (#${shown(s.playerInfo.backnum)}, ${shown(s.currentSeasonStats?.w)}-${shown(s.currentSeasonStats?.l)}, ${shown(s.currentSeasonStats?.era)} ERA)`
      : 'TBD';
  if (preview.homeStarter?.playerInfo?.name || preview.awayStarter?.playerInfo?.name) {
    lines.push(`Starters: ${away} ${starter(preview.awayStarter)} vs ${home} ${starter(preview.homeStarter)}.`);
  }

  const hitter = (p: GamePreview['homeTopPlayer']): string | null =>
    p?.playerInfo?.name
      ? `${p.playerInfo.name} (${shown(p.currentSeasonStats?.hra)} AVG, ${shown(p.currentSeasonStats?.hr)} HR, ${shown(p.currentSeasonStats?.rbi)} RBI)`
      : null;
  const keyAway = hitter(preview.awayTopPlayer);
  const keyHome = hitter(preview.homeTopPlayer);
  if (keyAway || keyHome) {
    lines.push(`Key hitters: ${away} ${keyAway ?? '-'}; ${home} ${keyHome ?? '-'}.`);
  }

  const series = preview.seasonVsResult;
  if (series) {
    lines.push(`Season series: ${away} ${shown(series.aw, '0')} wins, ${home} ${shown(series.hw, '0')} wins.`);
  }

  const awayLineup = lineup(preview.awayTeamLineUp?.fullLineUp ?? []);
  const homeLineup = lineup(preview.homeTeamLineUp?.fullLineUp ?? []);
  if (awayLineup) lines.push(`${away} lineup: ${awayLineup}`);
  if (homeLineup) lines.push(`${home} lineup: ${homeLineup}`);

  return lines.join('\n');
}
