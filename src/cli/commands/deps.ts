import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/index.js';
import { fetchMetadata, toComponentDescriptors } from '../../core/metadata/index.js';
import {
  computeOfferedOptions,
  groupComponents,
  type ComponentDescriptor,
} from '../../core/components/index.js';
import { renderVersionInterval } from '../../core/version/index.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface DepsOptions {
  boot?: string;
  json?: boolean;
  config?: string;
}

/**
 * Create the deps command.
 */
export function createDepsCommand(): Command {
  return new Command('deps')
    .description('List available dependencies and the Spring Boot versions they support')
    .option('-b, --boot <version>', 'Only list dependencies compatible with this Spring Boot version')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Config file (default: .springinit.yaml)')
    .action(async (options: DepsOptions) => {
      try {
        await runDeps(options);
      } catch (error) {
        log.error(errorMessage(error), error);
        process.exit(1);
      }
    });
}

export async function runDeps(options: DepsOptions, cwd: string = process.cwd()): Promise<void> {
  const config = await loadConfig(cwd, options.config);
  const metadata = await fetchMetadata(config);
  const all = toComponentDescriptors(metadata);
  const components = options.boot ? computeOfferedOptions(all, options.boot) : all;

  if (options.json) {
    console.log(JSON.stringify(components.map(toJson), null, 2));
    return;
  }

  console.log();
  console.log(
    chalk.bold(
      options.boot
        ? `${components.length} of ${all.length} dependencies available for Spring Boot ${options.boot}`
        : `${all.length} dependencies`
    )
  );

  for (const group of groupComponents(components)) {
    console.log();
    console.log(chalk.bold(group.name));
    for (const component of group.components) {
      const condition = renderVersionInterval(component.compatibility);
      console.log(
        `  ${chalk.cyan(component.id.padEnd(28))} ${component.displayName}${condition ? chalk.dim(`  (${condition})`) : ''}`
      );
    }
  }
  console.log();
}

function toJson(component: ComponentDescriptor): Record<string, unknown> {
  return {
    id: component.id,
    name: component.displayName,
    group: component.group,
    versionRange: component.compatibilityRange ?? null,
    condition: renderVersionInterval(component.compatibility) || null,
  };
}
