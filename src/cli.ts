#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, DESCRIPTION } from './config/branding.js';
import {
  addRunOptions,
  installFlow,
  registerVersion,
  registerInstall,
  registerPlan,
  registerList,
  registerStatus,
  registerDoctor,
  registerConfig,
  type RunFlags,
} from './commands/index.js';
import { die } from './ui/output.js';

const program = new Command()
  .name(APP_NAME)
  .description(
    `${DESCRIPTION}.\n` +
      'Run without a command to pick components interactively.',
  )
  .enablePositionalOptions()
  .showHelpAfterError(true);

// Bare invocation opens the selector
addRunOptions(program).action(async (opts: RunFlags) => {
  try {
    await installFlow({ kind: 'interactive' }, opts);
  } catch (err) {
    die(err);
  }
});

registerVersion(program);
registerInstall(program);
registerPlan(program);
registerList(program);
registerStatus(program);
registerDoctor(program);
registerConfig(program);

await program.parseAsync();
