#!/usr/bin/env node
/**
 * metaprompt CLI - run and evaluate prompting-strategy experiments
 *
 * @module bin/metaprompt
 */

import 'dotenv/config';
import { Command } from 'commander';
import { registerCommands } from './commands.js';
import { VERSION } from './cli-config.js';

const program = new Command();

program
  .name('metaprompt')
  .description('Meta-prompting experiment harness and evaluator')
  .version(VERSION);

registerCommands(program);

await program.parseAsync();
