// Version is read from package.json at build time
import pkg from '../package.json'

export const VERSION = pkg.version
export const DESCRIPTION = pkg.description
