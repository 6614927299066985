/**
 * Fixed user-facing texts. Raw errors never reach the user; every failure
 * path ends in one of these.
 */

export const MESSAGES = {
  compileFailure:
    "Sorry, I couldn't turn that question into a lookup. Could you rephrase it?",
  unsupportedTable: "Sorry, I can't look up that kind of data yet.",
  llmFailure:
    "Sorry, I couldn't work out how to look that up right now. Please try again in a moment.",
  internalFailure: 'Sorry, something went wrong while answering. Please try again.',
  noGamesScheduled: 'There are no games scheduled that day.',
  noGamesPlayed: 'There were no games that day.',
  noPlayerData: "I couldn't find any data for that player.",
  noFilterData: "I couldn't find any data matching those filters.",
  noTeamNamed: 'Which team do you mean? Please name a team.',
} as const;

export type MessageKey = keyof typeof MESSAGES;
