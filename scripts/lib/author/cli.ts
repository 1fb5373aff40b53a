import { inputValidated, interactivePromptAdapter, type PromptAdapter } from '../cli_prompts.js';
import { resolveFromCwd, toPosixRelative } from '../io.js';
import { assembleCatalog } from './assemble.js';
import {
  CONFIG_OPTION_NAMES,
  applyCliOverrides,
  loadAuthorConfig,
  parseBooleanOption,
  type AuthorConfig
} from './config.js';
import { generateCatalogMarkdown } from './generate.js';
import { validateMarkdownDir } from './validate.js';

export const AUTHOR_COMMANDS = ['catalog-generate', 'catalog-assemble', 'validate-markdown'] as const;

export type AuthorCommand = (typeof AUTHOR_COMMANDS)[number];

const COMMAND_OPTIONS: Record<AuthorCommand, readonly string[]> = {
  'catalog-generate': ['catalog', 'output', 'yaml-header', 'profile', 'check'],
  'catalog-assemble': ['markdown', 'output', 'catalog', 'check'],
  'validate-markdown': ['template', 'markdown']
};

const COMMON_OPTIONS: readonly string[] = ['config', ...CONFIG_OPTION_NAMES];

function isAuthorCommand(value: string): value is AuthorCommand {
  return AUTHOR_COMMANDS.some((command) => command === value);
}

export function parseCliOptionMap(args: string[]): Map<string, string> {
  const options = new Map<string, string>();

  for (let index = 0; index < args.length; index += 1) {
    const keyToken = args[index];
    if (!keyToken.startsWith('--')) {
      throw new Error(`Unexpected argument '${keyToken}'. Expected --key value pairs`);
    }

    const key = keyToken.slice(2).trim();
    if (!key) {
      throw new Error(`Invalid option '${keyToken}'`);
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for option '--${key}'`);
    }

    options.set(key, value);
    index += 1;
  }

  return options;
}

function assertKnownOptions(command: AuthorCommand, options: Map<string, string>): void {
  const allowed = new Set([...COMMAND_OPTIONS[command], ...COMMON_OPTIONS]);
  for (const key of options.keys()) {
    if (!allowed.has(key)) {
      throw new Error(`Unknown option '--${key}' for ${command}`);
    }
  }
}

async function requirePath(
  options: Map<string, string>,
  key: string,
  message: string,
  prompt: PromptAdapter
): Promise<string> {
  const given = options.get(key)?.trim();
  const value =
    given ||
    (await inputValidated(prompt, {
      message,
      validate: (entry) => (entry ? undefined : `--${key} is required`)
    }));
  return resolveFromCwd(value);
}

function optionalPath(options: Map<string, string>, key: string): string | undefined {
  const value = options.get(key)?.trim();
  return value ? resolveFromCwd(value) : undefined;
}

function checkFlag(options: Map<string, string>): boolean {
  const value = options.get('check');
  return value === undefined ? false : parseBooleanOption(value, 'check');
}

async function runGenerate(options: Map<string, string>, config: AuthorConfig, prompt: PromptAdapter): Promise<number> {
  const check = checkFlag(options);
  const summary = await generateCatalogMarkdown({
    catalogPath: await requirePath(options, 'catalog', 'Catalog JSON file:', prompt),
    markdownDir: await requirePath(options, 'output', 'Markdown output directory:', prompt),
    yamlHeaderPath: optionalPath(options, 'yaml-header'),
    profilePath: optionalPath(options, 'profile'),
    overwriteHeaderValues: config.overwriteHeaderValues,
    paramRep: config.paramRep,
    valueSeparator: config.valueSeparator,
    check
  });

  if (check) {
    if (summary.changed > 0) {
      console.error(`\n${summary.changed} markdown file(s) would be updated by catalog-generate`);
      return 1;
    }
    console.log('catalog-generate check passed.');
    return 0;
  }

  console.log(
    `\nDone. ${summary.changed} of ${summary.files.length} control file(s) updated, ${summary.withdrawn} withdrawn control(s) skipped.`
  );
  return 0;
}

async function runAssemble(options: Map<string, string>, config: AuthorConfig, prompt: PromptAdapter): Promise<number> {
  const check = checkFlag(options);
  const outputPath = await requirePath(options, 'output', 'Assembled catalog JSON file:', prompt);
  const summary = await assembleCatalog({
    markdownDir: await requirePath(options, 'markdown', 'Markdown directory:', prompt),
    outputPath,
    originalCatalogPath: optionalPath(options, 'catalog'),
    setParameters: config.setParameters,
    version: config.version,
    check
  });

  if (check) {
    if (summary.changed) {
      console.error(`\n${toPosixRelative(outputPath)} would be updated by catalog-assemble`);
      return 1;
    }
    console.log('catalog-assemble check passed.');
    return 0;
  }

  const status = summary.changed ? 'Updated' : 'No changes to';
  console.log(`\nDone. ${status} ${toPosixRelative(outputPath)} from ${summary.controls} control file(s).`);
  return 0;
}

async function runValidate(options: Map<string, string>, config: AuthorConfig, prompt: PromptAdapter): Promise<number> {
  const reports = await validateMarkdownDir({
    templatePath: await requirePath(options, 'template', 'Template markdown file:', prompt),
    markdownDir: await requirePath(options, 'markdown', 'Markdown directory to validate:', prompt),
    validateHeader: config.validateHeader,
    validateBody: config.validateBody,
    governedHeading: config.governedHeading,
    templateVersion: config.templateVersion,
    placeholderPattern: config.placeholderPattern
  });

  const failures = reports.filter((report) => !report.result.valid).length;
  if (failures > 0) {
    console.error(`\n${failures} of ${reports.length} markdown file(s) do not match the template`);
    return 1;
  }

  console.log(`All ${reports.length} markdown file(s) match the template.`);
  return 0;
}

export async function runAuthorCli(
  argv: string[] = process.argv.slice(2),
  prompt: PromptAdapter = interactivePromptAdapter
): Promise<number> {
  const hasCommand = argv.length > 0 && !argv[0].startsWith('--');
  const cliOptions = parseCliOptionMap(hasCommand ? argv.slice(1) : argv);

  let command = hasCommand ? argv[0].trim().toLowerCase() : '';
  if (!command) {
    command = await prompt.select({
      message: 'Command:',
      choices: AUTHOR_COMMANDS.map((value) => ({ name: value, value }))
    });
  }

  if (!isAuthorCommand(command)) {
    throw new Error(`Unknown command '${command}'. Expected ${AUTHOR_COMMANDS.join('|')}`);
  }
  assertKnownOptions(command, cliOptions);

  const config = applyCliOverrides(await loadAuthorConfig(optionalPath(cliOptions, 'config')), cliOptions);

  switch (command) {
    case 'catalog-generate':
      return runGenerate(cliOptions, config, prompt);
    case 'catalog-assemble':
      return runAssemble(cliOptions, config, prompt);
    case 'validate-markdown':
      return runValidate(cliOptions, config, prompt);
  }
}
