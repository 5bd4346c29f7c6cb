#!/usr/bin/env node

import {
  cmdCheck,
  cmdDisable,
  cmdEnable,
  cmdList,
  cmdPath,
  createDefaultDeps,
} from './cli/probes.js';
import { VERSION } from './version.js';

const args = process.argv.slice(2);
const command = args[0];

function hasFlag(flag: string): boolean {
  return args.includes(flag);
}

/** Positional arguments after the command */
function operands(): string[] {
  return args.slice(1).filter((arg) => !arg.startsWith('--'));
}

function printUsage(): void {
  console.log('Usage: probekit <command>');
  console.log('');
  console.log('Commands:');
  console.log('  list              Show known probes grouped by catalog');
  console.log('  check [names...]  Check whether capabilities are present');
  console.log('  path <name>       Print the absolute path a probe resolves to');
  console.log('  disable <name>    Skip a probe in "check"');
  console.log('  enable <name>     Re-enable a disabled probe');
  console.log('');
  console.log('Check options:');
  console.log('  --functional      Also verify that programs actually work');
  console.log('  --json            Print results as JSON');
  console.log('  --verbose         Log each probe evaluation to stderr');
}

function requireName(usage: string): string {
  const name = operands()[0];
  if (!name) {
    console.error(`Usage: probekit ${usage}`);
    process.exit(1);
  }
  return name;
}

async function main(): Promise<void> {
  switch (command) {
    case 'list':
      cmdList(createDefaultDeps());
      break;
    case 'check': {
      const names = operands();
      const summary = await cmdCheck(
        names,
        { functional: hasFlag('--functional'), json: hasFlag('--json') },
        createDefaultDeps({ verbose: hasFlag('--verbose') }),
      );
      // Absence only fails the command for explicitly named probes
      const failed = summary.unknown.length > 0 || summary.results.some((r) => !r.present);
      if (names.length > 0 && failed) process.exit(1);
      break;
    }
    case 'path': {
      const name = requireName('path <name>');
      const deps = createDefaultDeps({ verbose: hasFlag('--verbose') });
      if (!(await cmdPath(name, deps))) process.exit(1);
      break;
    }
    case 'disable': {
      const name = requireName('disable <name>');
      if (!cmdDisable(name, createDefaultDeps())) process.exit(1);
      break;
    }
    case 'enable': {
      const name = requireName('enable <name>');
      if (!cmdEnable(name, createDefaultDeps())) process.exit(1);
      break;
    }
    case '--version':
    case '-v':
      console.log(VERSION);
      break;
    case undefined:
    case '--help':
    case '-h':
      printUsage();
      break;
    default:
      printUsage();
      console.error(`\nUnknown command: ${command}`);
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
