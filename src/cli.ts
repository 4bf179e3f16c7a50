#!/usr/bin/env node
/**
 * provision-image
 *
 * Provisions the camera-trap image this process runs in. Configuration comes
 * from the environment (BASE_USER, NATUREWATCHCAMERA_VAR, PROVISION_*).
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { createSubsystemLogger, isLogLevel, setLogLevel } from './logging/subsystem.js';
import { loadProvisionConfig } from './provision/config/index.js';
import { describeError, exitCodeFor } from './provision/errors/index.js';
import { buildProvisioningPlan, describePlan, runProvisioning } from './provision/runner/index.js';
import type { ProvisionConfig } from './provision/types/index.js';

const log = createSubsystemLogger('cli');

const USAGE = `Usage: provision-image [options]

Options:
  --plan                 Print the provisioning steps and exit
  --log-level <level>    fatal, error, warn, info, debug or trace
  --no-trace             Log executed commands at debug level only
  -h, --help             Show this help
`;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text)
};

/**
 * Runs the command line; resolves with the process exit code
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  io: CliIo = processIo
): Promise<number> {
  let values: { plan?: boolean; 'log-level'?: string; 'no-trace'?: boolean; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        plan: { type: 'boolean' },
        'log-level': { type: 'string' },
        'no-trace': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' }
      },
      strict: true
    }));
  } catch (error) {
    io.stderr(`${describeError(error)}\n\n${USAGE}`);
    return 2;
  }

  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }

  const level = values['log-level'];
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      io.stderr(`Unknown log level '${level}'\n\n${USAGE}`);
      return 2;
    }
    setLogLevel(level);
  }

  let config: ProvisionConfig;
  try {
    config = loadProvisionConfig(env, values['no-trace'] ? { trace: false } : {});
  } catch (error) {
    io.stderr(`${describeError(error)}\n`);
    return exitCodeFor(error);
  }

  if (values.plan) {
    io.stdout(`${describePlan(buildProvisioningPlan(config))}\n`);
    return 0;
  }

  log.info('Provisioning image', {
    baseUser: config.baseUser,
    cameraServerDir: config.cameraServerDir,
    targetRoot: config.targetRoot
  });

  const result = await runProvisioning(config);
  return result.exitCode;
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return realpathSync(invoked) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().then(
    code => {
      process.exitCode = code;
    },
    error => {
      log.fatal('Unexpected failure', { error: describeError(error) });
      process.exitCode = exitCodeFor(error);
    }
  );
}
