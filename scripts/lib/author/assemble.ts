import fs from 'fs-extra';
import { randomUUID } from 'node:crypto';

import { CatalogInterface } from '../catalog_interface.js';
import { readCatalog, writeCatalog, type Catalog, type Control, type Group } from '../catalog_model.js';
import { PARENT_CONTROL_KEY, parseControlMarkdown, type ParsedControlMarkdown } from '../control_markdown.js';
import { CatalogFormatError, CatalogIntegrityError, IoFailureError } from '../errors.js';
import { toPosixRelative } from '../io.js';
import { controlIdOfFile, groupPathOfControlFile } from './paths.js';

export const ASSEMBLED_CATALOG_TITLE = 'Catalog assembled from markdown';
const DEFAULT_OSCAL_VERSION = '1.0.4';

export interface AssembleOptions {
  markdownDir: string;
  outputPath: string;
  originalCatalogPath?: string;
  setParameters: boolean;
  version?: string;
  check: boolean;
}

export interface MarkdownControl extends ParsedControlMarkdown {
  filePath: string;
  groupPath: string[];
}

export interface AssembleSummary {
  catalog: Catalog;
  controls: number;
  changed: boolean;
}

export async function readMarkdownControls(markdownDir: string): Promise<MarkdownControl[]> {
  if (!(await fs.pathExists(markdownDir))) {
    throw new IoFailureError(toPosixRelative(markdownDir), 'markdown directory does not exist');
  }

  const paths = await CatalogInterface.getSortedControlPaths(markdownDir);
  if (paths.length === 0) {
    throw new IoFailureError(toPosixRelative(markdownDir), 'no control markdown files found');
  }

  const seen = new Map<string, string>();
  const controls: MarkdownControl[] = [];
  for (const filePath of paths) {
    const source = toPosixRelative(filePath);
    const parsed = parseControlMarkdown(await fs.readFile(filePath, 'utf8'), source);
    const expectedId = controlIdOfFile(filePath);
    if (parsed.control.id !== expectedId) {
      throw new CatalogFormatError(
        `${source} describes control '${parsed.control.id}' but is named for '${expectedId}'`
      );
    }

    const previous = seen.get(expectedId);
    if (previous) {
      throw new CatalogIntegrityError(`Control '${expectedId}' is defined by both ${previous} and ${source}`);
    }
    seen.set(expectedId, source);

    controls.push({ ...parsed, filePath, groupPath: groupPathOfControlFile(markdownDir, filePath) });
  }

  return controls;
}

export function mergeIntoCatalog(
  original: Catalog,
  markdownControls: MarkdownControl[],
  setParameters: boolean
): Catalog {
  const catalogInterface = new CatalogInterface(original);
  catalogInterface.deleteWithdrawnControls();

  for (const { control } of markdownControls) {
    const base = catalogInterface.getControl(control.id);
    CatalogInterface.mergeControls(base, control, setParameters);
    catalogInterface.replaceControl(base);
  }

  return catalogInterface.getCatalog();
}

function ensureGroup(catalog: Catalog, groupPath: string[]): Group | null {
  let group: Group | null = null;

  for (const id of groupPath) {
    const siblings: Group[] = group ? group.groups ?? [] : catalog.groups ?? [];
    let next = siblings.find((candidate) => candidate.id === id);
    if (!next) {
      next = { id, title: id };
      siblings.push(next);
      if (group) {
        group.groups = siblings;
      } else {
        catalog.groups = siblings;
      }
    }
    group = next;
  }

  return group;
}

/**
 * Builds a catalog from the markdown alone. Group ids come from directory
 * names and group titles from the control headers; a control naming a parent
 * control that is also in the markdown is nested under it. Parameters are
 * kept only when `setParameters` is on.
 */
export function buildCatalogFromMarkdown(
  markdownControls: MarkdownControl[],
  setParameters: boolean,
  previous?: Catalog
): Catalog {
  const catalog: Catalog = {
    uuid: previous?.uuid ?? randomUUID(),
    metadata: previous?.metadata ?? {
      title: ASSEMBLED_CATALOG_TITLE,
      version: '0.0.0',
      'last-modified': new Date().toISOString(),
      'oscal-version': DEFAULT_OSCAL_VERSION
    }
  };

  const parents = new Map(markdownControls.map((entry) => [entry.control.id, entry.parentId]));
  for (const id of parents.keys()) {
    const chain = new Set<string>();
    for (let current: string | undefined = id; current !== undefined; current = parents.get(current)) {
      if (chain.has(current)) {
        throw new CatalogIntegrityError(`Control '${id}' is nested in itself through '${PARENT_CONTROL_KEY}'`);
      }
      chain.add(current);
    }
  }

  const assembled = new Map<string, Control>();
  for (const { control } of markdownControls) {
    const next: Control = { id: control.id, title: control.title };
    if (setParameters && control.params && control.params.length > 0) {
      next.params = control.params;
    }
    if (control.parts) {
      next.parts = control.parts;
    }
    assembled.set(control.id, next);
  }

  for (const { control, groupPath, groupTitle, parentId } of markdownControls) {
    const current = assembled.get(control.id);
    if (!current) {
      continue;
    }
    const parent = parentId === undefined ? undefined : assembled.get(parentId);
    if (parent) {
      parent.controls = [...(parent.controls ?? []), current];
      continue;
    }

    const group = ensureGroup(catalog, groupPath);
    if (group) {
      if (groupTitle) {
        group.title = groupTitle;
      }
      group.controls = [...(group.controls ?? []), current];
    } else {
      catalog.controls = [...(catalog.controls ?? []), current];
    }
  }

  return catalog;
}

function withLastModified(catalog: Catalog, lastModified: string | undefined): Catalog {
  const metadata = { ...catalog.metadata };
  if (lastModified === undefined) {
    delete metadata['last-modified'];
  } else {
    metadata['last-modified'] = lastModified;
  }
  return { ...catalog, metadata };
}

export async function assembleCatalog(options: AssembleOptions): Promise<AssembleSummary> {
  const markdownControls = await readMarkdownControls(options.markdownDir);
  const previous = (await fs.pathExists(options.outputPath)) ? await readCatalog(options.outputPath) : undefined;

  let catalog = options.originalCatalogPath
    ? mergeIntoCatalog(await readCatalog(options.originalCatalogPath), markdownControls, options.setParameters)
    : buildCatalogFromMarkdown(markdownControls, options.setParameters, previous);

  if (options.version) {
    catalog.metadata = { ...catalog.metadata, version: options.version };
  }

  // last-modified moves only when the rest of the catalog differs from the previous output.
  const previousStamp = previous?.metadata['last-modified'];
  const dryRun = await writeCatalog(options.outputPath, withLastModified(catalog, previousStamp), { check: true });
  catalog = withLastModified(catalog, dryRun.changed ? new Date().toISOString() : previousStamp);

  const result = await writeCatalog(options.outputPath, catalog, { check: options.check });
  if (result.changed) {
    console.log(
      `${options.check ? 'Would update' : 'Updated'} ${toPosixRelative(options.outputPath)} (${markdownControls.length} controls)`
    );
  }

  return { catalog, controls: markdownControls.length, changed: result.changed };
}
