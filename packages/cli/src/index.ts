#!/usr/bin/env node

/**
 * Valuescope CLI - Entry Point
 * Built with Gunshi
 */

import { cli, define, lazy } from 'gunshi';
import { CLI_DESCRIPTION, CLI_NAME, CLI_VERSION } from './utils/constants.js';
import { CLIError, EXIT_CODES } from './utils/error-handling.js';

type GroupRunner = (args: string[]) => Promise<void>;

interface CommandGroup {
  description: string;
  aliases: readonly string[];
  load: () => Promise<GroupRunner>;
}

// Each group runs its own cli() call so nested sub-commands get their own help
const COMMAND_GROUPS: Record<string, CommandGroup> = {
  analysis: {
    description: 'Financial metrics and value-creation analysis',
    aliases: ['analyze'],
    load: async () => (await import('./commands/analysis/index.js')).default,
  },
};

const mainCommand = define({
  name: CLI_NAME,
  description: CLI_DESCRIPTION,
  run: (ctx) => {
    ctx.log('Use --help to see available commands');
  },
});

function findGroup(name: string | undefined): CommandGroup | undefined {
  if (!name) return undefined;
  for (const [groupName, group] of Object.entries(COMMAND_GROUPS)) {
    if (groupName === name || group.aliases.includes(name)) return group;
  }
  return undefined;
}

async function main(args: string[]): Promise<void> {
  const group = findGroup(args[0]);
  if (group) {
    const runGroup = await group.load();
    await runGroup(args.slice(1));
    return;
  }

  // Top-level help lists the groups without loading them
  const subCommands = Object.fromEntries(
    Object.entries(COMMAND_GROUPS).flatMap(([name, group]) =>
      [name, ...group.aliases].map((entry) => [
        entry,
        lazy(async () => mainCommand, {
          name: entry,
          description: entry === name ? group.description : `Alias for ${name} commands`,
        }),
      ])
    )
  );

  await cli(args, mainCommand, {
    name: CLI_NAME,
    version: CLI_VERSION,
    description: CLI_DESCRIPTION,
    subCommands,
  });
}

main(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof CLIError) {
    if (!error.silent) {
      console.error(error.message);
    }
    process.exitCode = error.exitCode;
    return;
  }
  console.error('CLI Error:', error instanceof Error ? error.message : String(error));
  process.exitCode = EXIT_CODES.FAILURE;
});
