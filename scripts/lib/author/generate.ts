import fs from 'fs-extra';
import { parse as parseYaml } from 'yaml';

import { CatalogInterface } from '../catalog_interface.js';
import { readCatalog, readProfile, type Profile, type SetParameter } from '../catalog_model.js';
import { mergeHeaders, parseControlMarkdown, renderControlMarkdown, type HeaderRecord } from '../control_markdown.js';
import { CatalogFormatError, IoFailureError, errorMessage } from '../errors.js';
import { toPosixRelative, writeTextFile } from '../io.js';
import { getFullProfileParamDict, getProfileParamDict, type ParameterRep } from '../param_resolver.js';
import { controlMarkdownPath } from './paths.js';

export interface WriteMarkdownOptions {
  markdownDir: string;
  yamlHeader: HeaderRecord;
  profile?: Profile;
  overwriteHeaderValues: boolean;
  paramRep: ParameterRep;
  valueSeparator?: string;
  check: boolean;
}

export interface GenerateOptions extends Omit<WriteMarkdownOptions, 'profile' | 'yamlHeader'> {
  catalogPath: string;
  yamlHeaderPath?: string;
  profilePath?: string;
}

export interface GenerateSummary {
  files: string[];
  changed: number;
  withdrawn: number;
}

export async function readYamlHeader(filePath: string): Promise<HeaderRecord> {
  if (!(await fs.pathExists(filePath))) {
    throw new IoFailureError(toPosixRelative(filePath), 'YAML header file does not exist');
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    throw new CatalogFormatError(`${toPosixRelative(filePath)} is not valid YAML: ${errorMessage(error)}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new CatalogFormatError(`${toPosixRelative(filePath)} must contain a YAML mapping`);
  }
  return { ...parsed };
}

async function headerFor(filePath: string, options: WriteMarkdownOptions): Promise<HeaderRecord> {
  if (!(await fs.pathExists(filePath))) {
    return options.yamlHeader;
  }
  const existing = parseControlMarkdown(await fs.readFile(filePath, 'utf8'), toPosixRelative(filePath));
  return mergeHeaders(existing.header, options.yamlHeader, options.overwriteHeaderValues);
}

/**
 * Writes one markdown file per non-withdrawn control, sub-controls included,
 * under directories named after its groups. Headers already present in an output file are merged with
 * the supplied header rather than replaced.
 */
export async function writeCatalogAsMarkdown(
  catalogInterface: CatalogInterface,
  options: WriteMarkdownOptions
): Promise<GenerateSummary> {
  const fullParamDict = options.profile
    ? getFullProfileParamDict(options.profile)
    : new Map<string, SetParameter>();
  const summary: GenerateSummary = {
    files: [],
    changed: 0,
    withdrawn:
      catalogInterface.getCountOfControlsInCatalog(true) - catalogInterface.getCountOfControlsInCatalog(false)
  };

  for (const entry of catalogInterface.getAllControls(false)) {
    const { control } = entry;
    const filePath = controlMarkdownPath(options.markdownDir, entry.groupPath, control.id);
    const content = renderControlMarkdown(control, {
      header: await headerFor(filePath, options),
      groupTitle: entry.group?.title,
      parentId: entry.parentId ?? undefined,
      params: getProfileParamDict(control, fullParamDict),
      paramRep: options.paramRep,
      separator: options.valueSeparator
    });

    const result = await writeTextFile(filePath, content, { check: options.check });
    summary.files.push(filePath);
    if (result.changed) {
      summary.changed += 1;
      console.log(`${options.check ? 'Would update' : 'Updated'} ${toPosixRelative(filePath)}`);
    }
  }

  return summary;
}

export async function generateCatalogMarkdown(options: GenerateOptions): Promise<GenerateSummary> {
  const catalog = await readCatalog(options.catalogPath);
  const profile = options.profilePath ? await readProfile(options.profilePath) : undefined;
  const yamlHeader = options.yamlHeaderPath ? await readYamlHeader(options.yamlHeaderPath) : {};

  return writeCatalogAsMarkdown(new CatalogInterface(catalog), {
    ...options,
    yamlHeader,
    profile
  });
}
