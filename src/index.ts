#!/usr/bin/env node
/**
 * concept-graph - Entry Point
 */

import { program } from 'commander';
import { registerCommands } from './cli/commands';

registerCommands(program).parse();
