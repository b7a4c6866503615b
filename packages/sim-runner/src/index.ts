export { runEpisodes, playEpisode, placesOf, type RunOpts, type RunResult, type EpisodeResult } from './runEpisodes';
export { runRoundRobin, type RoundRobinOpts, type Standings, type MatchResult } from './tournament';
export { expectedScore, updateElo, getElo, DEFAULT_ELO, K_FACTOR, type EloTable } from './elo';
export { parseBotList, loadMany } from './loadBots';
export { runCli, getFlag, getBool, getInt } from './cli';
