export { computeBlockLength, partition } from './Partitioner';
