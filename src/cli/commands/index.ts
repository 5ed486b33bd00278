/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

export { registerPopulationCommands } from './population/index.js';
export { buildPopulationRows } from './population/series.js';
export { registerReportCommands } from './report/index.js';
export { buildRegionReport, type RegionReportRow } from './report/regions.js';
export { buildTimeReport, TIME_GROUPINGS, type TimeGrouping } from './report/time.js';
export { buildPrecinctRanking, type PrecinctRanking } from './report/precincts.js';
export { buildDemographicReport } from './report/demographics.js';
export { buildTrendReport, type TrendReportRow } from './report/trend.js';
export { registerExportCommand } from './export/index.js';
