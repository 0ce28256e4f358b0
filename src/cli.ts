#!/usr/bin/env node
import { Command } from 'commander';
import ora, { type Ora } from 'ora';
import pc from 'picocolors';
import { parseScanConfig } from './config.js';
import { parseRpcErrorMessage } from './rpc.js';
import { renderReport } from './render.js';
import { EXIT_INTERRUPTED, EXIT_OK, exitCodeFor, progressObserver, runScan } from './run.js';

const program = new Command();

program
  .name('votescan')
  .description("Check whether a validator's vote transactions landed in a range of slots")
  .version('0.1.0')
  .requiredOption('--url <url>', 'RPC endpoint URL')
  .requiredOption('--account <pubkey>', 'Vote account to look for (base58)')
  .requiredOption('--slot <slot>', 'Newest slot of the range')
  .requiredOption('--distance <count>', 'Number of slots to scan, counting down from --slot')
  .option('--identity <pubkey>', 'Validator identity, compared against the leader schedule')
  .option('--max-retries <n>', 'Retries per RPC call before a slot is marked errored')
  .option('--timeout-ms <ms>', 'Timeout for each RPC call in milliseconds')
  .option('--json', 'Print the report as JSON', false)
  .action(async () => {
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    let spinner: Ora | undefined;
    try {
      const config = parseScanConfig(program.opts());
      if (!config.json && process.stderr.isTTY) {
        spinner = ora({ text: 'Probing endpoint...', color: 'cyan', stream: process.stderr }).start();
      }

      const report = await runScan(config, {
        signal: controller.signal,
        observer: spinner ? progressObserver(spinner) : undefined,
      });
      spinner?.stop();

      const output = config.json
        ? JSON.stringify(report, null, 2)
        : renderReport(report, { color: Boolean(process.stdout.isTTY) });
      process.stdout.write(`${output}\n`);
      process.exitCode = EXIT_OK;
    } catch (error) {
      spinner?.stop();
      process.stderr.write(`\n${pc.red('✗')} ${parseRpcErrorMessage(error)}\n`);
      if (controller.signal.aborted) {
        // An abandoned in-flight request would otherwise keep the process alive.
        process.exit(EXIT_INTERRUPTED);
      }
      process.exitCode = exitCodeFor(error);
    }
  });

await program.parseAsync(process.argv);
