export { insertionSortRange, sortBlocks } from './BlockSorter';
export { correctivePass } from './CorrectivePass';
