export { readJsonLines, readJsonLinesSummary } from './json-lines';
export type { InvalidLine, ReadJsonLinesOptions, JsonLinesSummary } from './json-lines';
