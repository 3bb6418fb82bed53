#!/usr/bin/env node
/**
 * bin/dotfold.ts — entry point for the `dotfold` CLI command.
 */

import { program } from '../commands/index.js'

program.parse()
