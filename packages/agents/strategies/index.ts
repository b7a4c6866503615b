import { DEFAULT_SPACE_DEPTH } from '@lightcycle/shared';
import type { HeuristicFactory } from '../lib/thread';
import { DistanceStrategy } from './distance';
import { SpaceStrategy } from './space';
import { WallHugStrategy } from './wall-hug';

export { DistanceStrategy, rayLength } from './distance';
export { SpaceStrategy, floodArea } from './space';
export { WallHugStrategy } from './wall-hug';

/** Heuristics a worker thread can build by name. `space` reads `depth`. */
export const BUILTIN_HEURISTICS: Readonly<Record<string, HeuristicFactory>> = {
  distance: () => new DistanceStrategy(),
  space: ({ depth }) => new SpaceStrategy(typeof depth === 'number' ? depth : DEFAULT_SPACE_DEPTH),
  wallHug: () => new WallHugStrategy(),
};
