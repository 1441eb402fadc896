export {
  CoverageAggregator,
  CoverageContractError,
  type CoverageAggregatorOptions,
} from './coverage-aggregator.js';
export { buildGapList, priorityOrder } from './gap-list.js';
