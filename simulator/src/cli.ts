#!/usr/bin/env node
/**
 * cowsim CLI entry point.
 *
 * Usage: cowsim repl                         Start the interactive REPL
 *        cowsim run <file>                   Run a file of commands
 *        cowsim <file>                       Same as run
 *        cowsim --eval "<commands>"          Run commands separated by ';'
 *        cowsim ... --config <file.json>     Load simulator settings
 */

import * as fs from 'fs';
import * as path from 'path';
import { Simulator, SimulatorOptions } from './simulator';
import { CommandInterpreter, runScript } from './commands';
import { loadConfig } from './config';
import { SimulatorError } from './errors';
import { startRepl } from './repl';

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    process.exit(0);
  }

  let options: SimulatorOptions;
  let rest: string[];
  try {
    ({ options, rest } = extractConfig(args));
  } catch (e) {
    if (e instanceof SimulatorError) {
      console.error(e.message);
      process.exit(1);
    }
    throw e;
  }

  if (rest.length === 0) {
    printUsage();
    process.exit(1);
  }

  if (rest[0] === 'repl') {
    startRepl(options);
    return; // REPL runs its own event loop
  }

  let source: string;
  let filename: string;

  if (rest[0] === '--eval' || rest[0] === '-e') {
    if (rest.length < 2) {
      console.error('Error: --eval requires a command argument');
      process.exit(1);
    }
    source = rest[1];
    filename = '<eval>';
  } else if (rest[0] === 'run' && rest.length >= 2) {
    filename = rest[1];
    source = readFile(filename);
  } else {
    filename = rest[0];
    source = readFile(filename);
  }

  const interpreter = new CommandInterpreter(new Simulator(options));
  const ok = runScript(source, interpreter, {
    out: line => console.log(line),
    err: line => console.error(filename === '<eval>' ? line : `${filename}: ${line}`),
  });
  process.exit(ok ? 0 : 1);
}

/** Pull `--config <file>` out of the argument list. */
function extractConfig(args: string[]): { options: SimulatorOptions; rest: string[] } {
  const rest: string[] = [];
  let options: SimulatorOptions = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--config') {
      const file = args[++i];
      if (file === undefined) throw new SimulatorError('Error: --config requires a file argument');
      options = loadConfig(path.resolve(file));
    } else {
      rest.push(args[i]);
    }
  }
  return { options, rest };
}

function readFile(filepath: string): string {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) {
    console.error(`Error: File not found: ${resolved}`);
    process.exit(1);
  }
  return fs.readFileSync(resolved, 'utf-8');
}

function printUsage(): void {
  console.log('cowsim v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  cowsim repl                       Start interactive REPL');
  console.log('  cowsim run <file>                 Run a file of commands');
  console.log('  cowsim <file>                     Run a file of commands');
  console.log('  cowsim --eval "<commands>"        Run commands separated by ;');
  console.log('  cowsim --config <file.json> ...   Load simulator settings');
  console.log('  cowsim --help                     Show this help');
}

main();
