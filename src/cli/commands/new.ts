import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/index.js';
import { fetchMetadata, toComponentDescriptors } from '../../core/metadata/index.js';
import { generateProject, type GenerateResult } from '../../core/generator/index.js';
import {
  normalizeIds,
  resolveProjectInfo,
  verifyProjectInfo,
  type ProjectAnswers,
} from '../../core/project/index.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { runProjectForm } from '../form.js';
import { createTerminalPrompter } from '../prompts.js';

export interface NewOptions {
  group?: string;
  artifact?: string;
  description?: string;
  language?: string;
  java?: string;
  boot?: string;
  type?: string;
  packaging?: string;
  dependencies?: string;
  yes?: boolean;
  config?: string;
}

/**
 * Create the new command.
 */
export function createNewCommand(): Command {
  return new Command('new')
    .description('Generate a new Spring Boot project in a new directory')
    .argument('[name]', 'Project name, also the directory to create')
    .option('-g, --group <groupId>', 'Group id')
    .option('-a, --artifact <artifactId>', 'Artifact id')
    .option('-d, --description <text>', 'Short description')
    .option('-l, --language <language>', 'Language (e.g. java, kotlin, groovy)')
    .option('-j, --java <version>', 'Java version')
    .option('-b, --boot <version>', 'Spring Boot version')
    .option('-t, --type <type>', 'Project type (e.g. maven-project, gradle-project)')
    .option('-p, --packaging <packaging>', 'Packaging (jar or war)')
    .option('--dependencies <ids>', 'Comma-separated dependency ids')
    .option('-y, --yes', 'Use defaults for everything not given; do not prompt')
    .option('-c, --config <path>', 'Config file (default: .springinit.yaml)')
    .action(async (name: string | undefined, options: NewOptions) => {
      try {
        await runNew(name, options);
      } catch (error) {
        log.error(errorMessage(error), error);
        process.exit(1);
      }
    });
}

export async function runNew(
  name: string | undefined,
  options: NewOptions,
  cwd: string = process.cwd()
): Promise<GenerateResult> {
  const config = await loadConfig(cwd, options.config);

  log.debug(`Loading metadata from ${config.service_url}`);
  const metadata = await fetchMetadata(config);
  const components = toComponentDescriptors(metadata, (id, issues) => {
    log.debug(`Version range of '${id}' only partly understood: ${issues.join('; ')}`);
  });

  const preset = answersFromOptions(name, options);
  let answers: ProjectAnswers = preset;
  if (!options.yes) {
    const { prompter, close } = createTerminalPrompter();
    try {
      answers = await runProjectForm(prompter, { metadata, components, defaults: config.defaults, cwd }, preset);
    } finally {
      close();
    }
  }

  const info = resolveProjectInfo(answers, metadata, config.defaults);
  verifyProjectInfo(info, metadata, components);

  log.info('Generating project...');
  const result = await generateProject(config, info, { cwd });

  console.log();
  log.success(`Project generated in ${result.root}`);
  console.log();
  console.log(chalk.dim('Next steps:'));
  console.log(`  cd ${chalk.cyan(path.relative(cwd, result.root) || '.')}`);
  return result;
}

/**
 * Answers given on the command line. Unset flags stay undefined so the
 * form asks for them.
 */
export function answersFromOptions(name: string | undefined, options: NewOptions): ProjectAnswers {
  const answers: ProjectAnswers = {};
  if (name !== undefined) answers.name = name;
  if (options.group !== undefined) answers.groupId = options.group;
  if (options.artifact !== undefined) answers.artifactId = options.artifact;
  if (options.description !== undefined) answers.description = options.description;
  if (options.language !== undefined) answers.language = options.language;
  if (options.java !== undefined) answers.javaVersion = options.java;
  if (options.boot !== undefined) answers.bootVersion = options.boot;
  if (options.type !== undefined) answers.type = options.type;
  if (options.packaging !== undefined) answers.packaging = options.packaging;
  if (options.dependencies !== undefined) answers.dependencies = normalizeIds([options.dependencies]);
  return answers;
}
