export { detectOrderedBoundaries, orderedPrefixLength, coalesceRuns } from './RunDetector';
