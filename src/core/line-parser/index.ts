export { parseLine } from './line-parser';
export { parseNumber, describePayload, stripTerminator } from './helpers';
