/* Worker thread entry: serves the built-in heuristics to a WorkerPool. */
import { BUILTIN_HEURISTICS } from '../strategies';
import { serveHeuristics } from './thread';

serveHeuristics(BUILTIN_HEURISTICS);
