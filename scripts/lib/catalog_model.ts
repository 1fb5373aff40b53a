import fs from 'fs-extra';
import { z } from 'zod';

import { CatalogFormatError, IoFailureError, errorMessage } from './errors.js';
import { toPosixRelative, writeJsonFile, type RunOptions, type WriteResult } from './io.js';

export interface Property {
  name: string;
  value: string;
  class?: string;
}

export interface Link {
  href: string;
  rel?: string;
  text?: string;
}

export interface Part {
  id?: string;
  name: string;
  title?: string;
  prose?: string;
  props?: Property[];
  parts?: Part[];
}

export interface ParameterSelection {
  'how-many'?: string;
  choice?: string[];
}

export interface Parameter {
  id: string;
  label?: string;
  values?: string[];
  select?: ParameterSelection;
  props?: Property[];
}

export interface Control {
  id: string;
  title: string;
  class?: string;
  params?: Parameter[];
  props?: Property[];
  links?: Link[];
  parts?: Part[];
  controls?: Control[];
}

export interface Group {
  id: string;
  title: string;
  class?: string;
  props?: Property[];
  parts?: Part[];
  groups?: Group[];
  controls?: Control[];
}

const PropertySchema: z.ZodType<Property> = z.object({
  name: z.string().min(1),
  value: z.string(),
  class: z.string().optional()
}).passthrough();

const LinkSchema: z.ZodType<Link> = z.object({
  href: z.string(),
  rel: z.string().optional(),
  text: z.string().optional()
}).passthrough();

const PartSchema: z.ZodType<Part> = z.lazy(() =>
  z.object({
    id: z.string().optional(),
    name: z.string().min(1),
    title: z.string().optional(),
    prose: z.string().optional(),
    props: z.array(PropertySchema).optional(),
    parts: z.array(PartSchema).optional()
  }).passthrough()
);

const ParameterSelectionSchema: z.ZodType<ParameterSelection> = z.object({
  'how-many': z.string().optional(),
  choice: z.array(z.string()).optional()
}).passthrough();

const ParameterSchema: z.ZodType<Parameter> = z.object({
  id: z.string().min(1),
  label: z.string().optional(),
  values: z.array(z.string()).optional(),
  select: ParameterSelectionSchema.optional(),
  props: z.array(PropertySchema).optional()
}).passthrough();

const ControlSchema: z.ZodType<Control> = z.lazy(() =>
  z.object({
    id: z.string().min(1),
    title: z.string(),
    class: z.string().optional(),
    params: z.array(ParameterSchema).optional(),
    props: z.array(PropertySchema).optional(),
    links: z.array(LinkSchema).optional(),
    parts: z.array(PartSchema).optional(),
    controls: z.array(ControlSchema).optional()
  }).passthrough()
);

const GroupSchema: z.ZodType<Group> = z.lazy(() =>
  z.object({
    id: z.string().min(1),
    title: z.string(),
    class: z.string().optional(),
    props: z.array(PropertySchema).optional(),
    parts: z.array(PartSchema).optional(),
    groups: z.array(GroupSchema).optional(),
    controls: z.array(ControlSchema).optional()
  }).passthrough()
);

const MetadataSchema = z
  .object({
    title: z.string(),
    version: z.string(),
    'last-modified': z.string().optional(),
    'oscal-version': z.string().optional()
  })
  .passthrough();

export const CatalogSchema = z
  .object({
    uuid: z.string(),
    metadata: MetadataSchema,
    params: z.array(ParameterSchema).optional(),
    controls: z.array(ControlSchema).optional(),
    groups: z.array(GroupSchema).optional(),
    'back-matter': z.unknown().optional()
  })
  .passthrough();

const SetParameterSchema = z
  .object({
    'param-id': z.string().min(1),
    label: z.string().optional(),
    values: z.array(z.string()).optional(),
    select: ParameterSelectionSchema.optional()
  })
  .passthrough();

export const ProfileSchema = z
  .object({
    uuid: z.string(),
    metadata: MetadataSchema,
    imports: z.array(z.object({ href: z.string() }).passthrough()),
    modify: z
      .object({
        'set-parameters': z.array(SetParameterSchema).optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

export type Metadata = z.infer<typeof MetadataSchema>;
export type Catalog = z.infer<typeof CatalogSchema>;
export type SetParameter = z.infer<typeof SetParameterSchema>;
export type Profile = z.infer<typeof ProfileSchema>;

const CatalogDocumentSchema = z.object({ catalog: CatalogSchema });
const ProfileDocumentSchema = z.object({ profile: ProfileSchema });

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${location}: ${issue.message}`;
  });
}

async function readJsonDocument(filePath: string): Promise<unknown> {
  if (!(await fs.pathExists(filePath))) {
    throw new IoFailureError(toPosixRelative(filePath), 'file does not exist');
  }

  try {
    return await fs.readJson(filePath);
  } catch (error) {
    throw new CatalogFormatError(`${toPosixRelative(filePath)} is not valid JSON: ${errorMessage(error)}`);
  }
}

export function parseCatalogDocument(raw: unknown, source: string): Catalog {
  const result = CatalogDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new CatalogFormatError(`${source} is not a valid catalog document`, formatIssues(result.error));
  }
  return result.data.catalog;
}

export function parseProfileDocument(raw: unknown, source: string): Profile {
  const result = ProfileDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new CatalogFormatError(`${source} is not a valid profile document`, formatIssues(result.error));
  }
  return result.data.profile;
}

export async function readCatalog(filePath: string): Promise<Catalog> {
  const raw = await readJsonDocument(filePath);
  return parseCatalogDocument(raw, toPosixRelative(filePath));
}

export async function readProfile(filePath: string): Promise<Profile> {
  const raw = await readJsonDocument(filePath);
  return parseProfileDocument(raw, toPosixRelative(filePath));
}

export async function writeCatalog(
  filePath: string,
  catalog: Catalog,
  options: RunOptions
): Promise<WriteResult> {
  return writeJsonFile(filePath, { catalog }, options);
}

export function findProperty(props: Property[] | undefined, name: string): Property | undefined {
  return props?.find((prop) => prop.name === name);
}
