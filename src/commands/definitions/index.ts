export { buildHelpText, helpCommand } from './help.js'
export type { HelpDependencies } from './help.js'
export { buildStatsText, formatDuration, statsCommand } from './stats.js'
export type { StatsDependencies } from './stats.js'
