export { program } from './commands/index.js'
export { classifySource, formatResultBody, formatResultHeader, parseModuleArgs } from './format.js'
