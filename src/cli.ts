#!/usr/bin/env node
/**
 * Command-line runner.
 *
 *   ride-sim <events-file> [--policy shared|reserve] [--trace]
 *
 * Replays the event script and prints the report as JSON. Any failure is
 * written to stderr and the process exits with status 1.
 */

import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { DispatchPolicy, parseDispatchPolicy } from './models/types';
import { configManager } from './config/config';
import { Simulation } from './simulation/Simulation';
import { parseEventScript } from './utils/eventScript';

export const USAGE = 'Usage: ride-sim <events-file> [--policy shared|reserve] [--trace]';

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

const consoleOutput: CliOutput = {
  out: text => console.log(text),
  err: text => console.error(text)
};

/**
 * Run the CLI with the arguments that follow the program name.
 *
 * @returns The process exit status
 */
export async function runCli(argv: string[], output: CliOutput = consoleOutput): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        policy: { type: 'string' },
        trace: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false }
      }
    });

    if (values.help) {
      output.out(USAGE);
      return 0;
    }
    if (positionals.length !== 1) {
      output.err(USAGE);
      return 1;
    }

    const dispatchPolicy = resolvePolicy(values.policy);
    const recordTrace = values.trace === true;
    const config = configManager.applyOverrides(configManager.getDefaultConfig(), {
      dispatchPolicy,
      recordTrace
    });

    const script = await readFile(positionals[0], 'utf8');
    const simulation = new Simulation(config);
    const report = simulation.run(parseEventScript(script));

    output.out(JSON.stringify({
      report,
      dispatcher: simulation.dispatcher.snapshot(),
      eventsProcessed: simulation.eventsProcessed,
      finalTime: simulation.currentTime,
      ...(recordTrace ? { trace: simulation.getTrace() } : {})
    }, null, 2));
    return 0;
  } catch (error) {
    output.err(`[CLI] ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

function resolvePolicy(value: string | undefined): DispatchPolicy {
  if (value === undefined) {
    return configManager.getDefaultConfig().dispatchPolicy;
  }
  const policy = parseDispatchPolicy(value);
  if (!policy) {
    throw new Error(`--policy must be one of ${Object.values(DispatchPolicy).join(', ')}, got "${value}"`);
  }
  return policy;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('[CLI] Unexpected failure:', error);
      process.exitCode = 1;
    });
}
