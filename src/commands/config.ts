import { Command } from 'commander';
import { configManager, type ConfigManager } from '../core/config.js';
import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { formatPathForDisplay } from '../utils/formatters.js';

interface ConfigOptions {
  reset?: boolean;
}

/**
 * Show the effective configuration, or reset it to defaults
 */
export function setupConfigCommand(program: Command, manager: ConfigManager = configManager): void {
  program
    .command('config')
    .description('Show the effective configuration')
    .option('--reset', 'restore the default configuration')
    .action(
      withErrorHandling(async (options: ConfigOptions, command: Command) => {
        const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
        const ctx = await createCliExecutionContext({ cwd });
        const out = resolveOutput(ctx);

        if (options.reset) {
          await manager.reset();
          out.success('Configuration reset to defaults');
        }

        const config = await manager.load();
        const configPath = formatPathForDisplay(await manager.getConfigFilePath(), ctx.cwd);
        out.note(JSON.stringify(config, null, 2), configPath);
      })
    );
}
