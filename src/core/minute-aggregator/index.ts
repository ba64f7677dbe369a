export { aggregateMinute } from './minute-aggregator';
export { median, aggregateColumns } from './helpers';
