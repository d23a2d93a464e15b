/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/keel.ts
 *   src/index.ts
 */

import { program } from 'commander'
import { compileCommand } from './compile.js'
import { factsCommand } from './facts.js'
import { parseCommand } from './parse.js'

program
  .name('keel')
  .description(
    'Keel — compiles declarative manifests into validated, dependency-ordered catalogs.\n' +
    'Configuration: <basedir>/keel.json, KEEL_BASEDIR, KEEL_LOG_LEVEL, KEEL_EXTRA_TESTS.',
  )
  .version('0.1.0')

program.addCommand(compileCommand)
program.addCommand(factsCommand)
program.addCommand(parseCommand)

export { program }
