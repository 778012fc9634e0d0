#!/usr/bin/env node

import { Command } from 'commander';
import { registerPlanCommand } from './commands/plan';
import { registerApplyCommand } from './commands/apply';
import { registerStateCommand } from './commands/state';
import { registerForgetCommand } from './commands/forget';
import { CONVERGE_DIR } from './const';
import * as path from 'path';
import * as os from 'os';
import * as fs from 'fs';
import * as dotenv from 'dotenv';
import debug from 'debug';

const debugCli = debug('cli:index');

// Setup environment variables before initializing commands
function setupEnvironment(): void {
  try {
    // Ensure ~/.converge directory exists
    const convergeDir = path.join(os.homedir(), CONVERGE_DIR);
    if (!fs.existsSync(convergeDir)) {
      fs.mkdirSync(convergeDir, { recursive: true, mode: 0o700 });
      debugCli('Created directory:', convergeDir);
    }

    // Load environment variables from ~/.converge/.env
    const envPath = path.join(convergeDir, '.env');
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      debugCli('Loaded environment variables from:', envPath);
    } else {
      debugCli('No .env file found at:', envPath);
    }
  } catch (error) {
    debugCli('Error setting up environment:', error);
  }
}

// Setup environment before initializing CLI
setupEnvironment();

const program = new Command();

program
  .name('converge')
  .description('Converge a host\'s integrations onto a declarative desired state')
  .version('0.1.0');

// Register all commands
registerPlanCommand(program);
registerApplyCommand(program);
registerStateCommand(program);
registerForgetCommand(program);

// Parse command line arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('❌', error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
