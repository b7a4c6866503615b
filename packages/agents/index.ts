export { WorkerPool, type Job, type PoolOpts } from './lib/pool';
export { serveHeuristics, type HeuristicFactory, type HeuristicOptions, type HeuristicTask, type HeuristicReply } from './lib/thread';
export { createLogger, describeError, type Logger } from './lib/log';
export { BUILTIN_HEURISTICS, DistanceStrategy, SpaceStrategy, WallHugStrategy, rayLength, floodArea } from './strategies';
export { StrategyJob, type ResultSink, type HeuristicRef } from './strategy-job';
export { CombinedStrategy, type WeightedHeuristic, type CombinedOpts, type RunSummary, type RunOutcome } from './combined-strategy';
export { DEFAULT_CONFIG, parseArgs, parseWeights, mergeConfig, validateConfig, type BotConfig, type StrategyWeights } from './config';
export { parseHeader, parsePlayerLine, parseFrame, readFrame } from './protocol';
export { Session, createCombinedStrategy, weightedHeuristics, type StrategyFactory, type SessionStrategy } from './session';
export { BOTS, createBot, RandomStrategy, type Bot, type BotFactory } from './bots';
export { runAdapter } from './cg-adapter';
