#!/usr/bin/env node
import { grant } from './auth';
import { loadRunnerConfig } from './config-loader';
import { ExecutionError } from './errors';
import { createConsoleLogger } from './logger';
import { RunnerMaintenance } from './maintenance';
import { loadOperationFile } from './operation-loader';
import { RunnerRuntime } from './runtime';
import { SecurityEngine } from './security';
import { RunnerFileStore } from './store';

const DEFAULT_CONFIG = 'config/runner.json';
const VALUE_FLAGS = ['--store', '--config', '--as'];

const USAGE = `usage: settlement-runner <command> [options]

commands:
  apply <file> [--as a,b]   execute an operation (bare or signed JSON)
  preview <account...>      rewards each account would be credited now
  state                     record and balance summary
  ledger                    notification ledger
  maintain                  execute every due recurring payment
  verify                    check the notification hash chain

options:
  --store <path>            checkpoint file (defaults to config store_path)
  --config <path>           runner configuration (default ${DEFAULT_CONFIG})`;

function getFlagValue(args: string[], flag: string, fallback?: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) {
    return fallback;
  }
  return args[index + 1] ?? fallback;
}

function positionals(args: string[]): string[] {
  const values: string[] = [];
  for (let i = 1; i < args.length; i += 1) {
    if (VALUE_FLAGS.includes(args[i])) {
      i += 1;
      continue;
    }
    values.push(args[i]);
  }
  return values;
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

async function buildRuntime(args: string[]) {
  const config = await loadRunnerConfig(getFlagValue(args, '--config', DEFAULT_CONFIG) ?? DEFAULT_CONFIG);
  const logger = createConsoleLogger(config.log_level);
  const security = new SecurityEngine(config.registry, config.security);
  const store = new RunnerFileStore(getFlagValue(args, '--store', config.store_path) ?? config.store_path);
  const runtime = await RunnerRuntime.loadFromStore(store, { security, logger });
  return { runtime, store, logger };
}

async function commandApply(args: string[]) {
  const [filePath] = positionals(args);
  if (!filePath) {
    throw new ExecutionError('apply requires an operation JSON file path');
  }
  const { runtime, store } = await buildRuntime(args);
  const loaded = await loadOperationFile(filePath);

  const principals = (getFlagValue(args, '--as') ?? '')
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  const result =
    loaded.kind === 'SIGNED'
      ? runtime.kernel.executeSigned(loaded.signed)
      : runtime.kernel.execute(loaded.operation, grant(...principals));

  await runtime.saveToStore(store);
  print(result);
}

async function commandPreview(args: string[]) {
  const accounts = positionals(args);
  if (accounts.length === 0) {
    throw new ExecutionError('preview requires at least one account');
  }
  const { runtime } = await buildRuntime(args);
  const rewards = runtime.kernel.previewRewards(accounts);
  print(accounts.map((account, index) => ({ account, reward: rewards[index] })));
}

async function commandState(args: string[]) {
  const { runtime } = await buildRuntime(args);
  const snapshot = runtime.state.snapshot();
  const summary = {
    initialized: runtime.kernel.getConfig() !== null,
    stakes: Object.keys(snapshot.stakes).length,
    escrows: Object.keys(snapshot.escrows).length,
    payments: Object.keys(snapshot.payments).length,
    notifications: runtime.ledger.size(),
  };
  print({ summary, snapshot, balances: runtime.tokens.snapshot() });
}

async function commandLedger(args: string[]) {
  const { runtime } = await buildRuntime(args);
  print(runtime.ledger.getEvents());
}

async function commandMaintain(args: string[]) {
  const { runtime, store, logger } = await buildRuntime(args);
  const maintenance = new RunnerMaintenance(runtime.kernel, logger);
  const result = maintenance.run();
  await runtime.saveToStore(store);
  print(result);
}

async function commandVerify(args: string[]) {
  const { runtime } = await buildRuntime(args);
  const report = runtime.ledger.verifyIntegrity();
  print({ notifications: runtime.ledger.size(), latest_hash: runtime.ledger.getLatestHash(), ...report });
  if (!report.ok) {
    process.exitCode = 1;
  }
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case 'apply':
      await commandApply(args);
      return;
    case 'preview':
      await commandPreview(args);
      return;
    case 'state':
      await commandState(args);
      return;
    case 'ledger':
      await commandLedger(args);
      return;
    case 'maintain':
      await commandMaintain(args);
      return;
    case 'verify':
      await commandVerify(args);
      return;
    default:
      console.error(USAGE);
      process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
