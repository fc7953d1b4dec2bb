#!/usr/bin/env node

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { registerDeployCommand, registerDeployStepCommand } from './commands/deploy/index.js';
import { registerStatusCommand } from './commands/status/index.js';
import { registerPlanCommand } from './commands/plan/index.js';
import { registerDestroyCommand } from './commands/destroy/index.js';
import { registerValidateCommand } from './commands/validate/index.js';
import { registerRunJobsCommand } from './commands/jobs/index.js';
import { registerUnlockCommand } from './commands/unlock/index.js';

const packageJson: { version: string } = JSON.parse(
  readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
);

const program = new Command();

program
  .name('gitops-orchestrator')
  .description('Provision, bootstrap and verify GitOps-managed Kubernetes environments')
  .version(packageJson.version);

// Register all commands
registerDeployCommand(program);
registerDeployStepCommand(program);
registerStatusCommand(program);
registerPlanCommand(program);
registerDestroyCommand(program);
registerValidateCommand(program);
registerRunJobsCommand(program);
registerUnlockCommand(program);

program.parse();
