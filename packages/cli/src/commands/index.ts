/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/dotfold.ts   (executable entry point)
 *   src/index.ts         (package entry)
 */

import { program } from 'commander'
import { settingsCommand } from './settings.js'

program
  .name('dotfold')
  .description(
    'dotfold — dotfile manager.\n' +
    'Settings are read from dotfold.toml in the standard configuration directory.',
  )
  .version('0.1.0')

program.addCommand(settingsCommand)

export { program }
