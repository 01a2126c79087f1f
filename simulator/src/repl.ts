/**
 * cowsim REPL: interactive read-eval-print loop over a single simulator.
 *
 * Usage: cowsim repl [--config <file.json>]
 *
 * Features:
 *   - Simulator state persists across inputs
 *   - Copy notifications for traced values print as they happen
 *   - Special commands: :help, :quit, :reset, :gcinfo on|off
 *   - Errors are printed and the loop continues
 */

import * as readline from 'readline';
import { Simulator, SimulatorOptions } from './simulator';
import { CommandInterpreter, HELP_TEXT } from './commands';

const VERSION = '0.1.0';

/**
 * Start the REPL.
 */
export function startRepl(options: SimulatorOptions = {}): void {
  let interpreter = new CommandInterpreter(new Simulator(options));

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'cowsim> ',
    terminal: true,
  });

  console.log(`cowsim REPL v${VERSION}`);
  console.log('Type help for commands, :quit to exit.\n');

  rl.prompt();

  rl.on('line', (line: string) => {
    const trimmed = line.trim();

    if (trimmed.startsWith(':')) {
      const next = handleMetaCommand(trimmed, interpreter, options, rl);
      if (next !== null) interpreter = next;
      rl.prompt();
      return;
    }

    const outcome = interpreter.execute(trimmed);
    for (const out of outcome.output) console.log(out);
    if (outcome.error !== null) console.error(`  ${outcome.error.message}`);

    rl.prompt();
  });

  rl.on('close', () => {
    console.log('');
    process.exit(0);
  });
}

/**
 * Handle a REPL meta command. Returns a replacement interpreter on :reset.
 */
function handleMetaCommand(
  cmd: string,
  interpreter: CommandInterpreter,
  options: SimulatorOptions,
  rl: readline.Interface,
): CommandInterpreter | null {
  const parts = cmd.split(/\s+/);

  switch (parts[0]) {
    case ':help':
    case ':h':
      console.log('');
      for (const line of HELP_TEXT) console.log(line);
      console.log('');
      console.log('REPL Commands:');
      console.log('  :help, :h       Show this help message');
      console.log('  :quit, :q       Exit the REPL');
      console.log('  :reset          Start over with an empty simulator');
      console.log('  :gcinfo on|off  Log every garbage collection');
      console.log('');
      return null;

    case ':quit':
    case ':q':
    case ':exit':
      rl.close();
      return null;

    case ':reset':
      interpreter.sim.dispose();
      console.log('Simulator state reset.');
      return new CommandInterpreter(new Simulator(options));

    case ':gcinfo':
      if (parts[1] !== 'on' && parts[1] !== 'off') {
        console.log('Usage: :gcinfo on|off');
        return null;
      }
      interpreter.sim.collector.setVerbose(parts[1] === 'on');
      return null;

    default:
      console.log(`Unknown command: ${parts[0]}. Type :help for available commands.`);
      return null;
  }
}
