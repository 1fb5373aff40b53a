import path from 'node:path';

import type { Catalog, Control, Group, Parameter, Part } from './catalog_model.js';
import { partLabel } from './control_markdown.js';
import { CatalogIntegrityError, NotFoundError } from './errors.js';
import { listMarkdownFiles } from './io.js';

export const CONTROL_FILE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/**
 * Where an indexed control lives: the ids of its ancestor groups (root first),
 * the owning group (null directly under the catalog) and, for a sub-control,
 * the id of the control it is nested in.
 */
export interface ControlEntry {
  control: Control;
  groupPath: string[];
  group: Group | null;
  parentId: string | null;
}

export function isWithdrawn(control: Control): boolean {
  return (control.props ?? []).some(
    (prop) => prop.name === 'status' && prop.value.trim().toLowerCase() === 'withdrawn'
  );
}

function mergeParams(base: Parameter[], incoming: Parameter[], replaceParams: boolean): Parameter[] {
  const incomingById = new Map(incoming.map((param) => [param.id, param]));
  const baseIds = new Set(base.map((param) => param.id));

  const kept = base
    .filter((param) => incomingById.has(param.id))
    .map((param) => {
      const update = incomingById.get(param.id);
      if (!replaceParams || !update) {
        return param;
      }
      const next: Parameter = { ...param };
      if (update.values && update.values.length > 0) {
        next.values = [...update.values];
      } else {
        delete next.values;
      }
      return next;
    });

  const added = incoming.filter((param) => !baseIds.has(param.id));
  return [...kept, ...added];
}

/**
 * Edited parts carry only what markdown holds: names, labels and prose.
 * Each edited part that matches a base sibling (top-level parts by name, items
 * by label) takes back the base part's id, name, title and properties.
 */
function restorePartIdentity(incoming: Part[], base: Part[], keyOf: (part: Part) => string): Part[] {
  const unmatched = [...base];
  return incoming.map((part) => {
    const index = unmatched.findIndex((candidate) => keyOf(candidate) === keyOf(part));
    if (index < 0) {
      return structuredClone(part);
    }

    const [match] = unmatched.splice(index, 1);
    const restored: Part = structuredClone(match);
    delete restored.prose;
    delete restored.parts;
    if (part.prose !== undefined) {
      restored.prose = part.prose;
    }
    const children = restorePartIdentity(part.parts ?? [], match.parts ?? [], partLabel);
    if (children.length > 0) {
      restored.parts = children;
    }
    return restored;
  });
}

export class CatalogInterface {
  private readonly entries = new Map<string, ControlEntry>();

  constructor(private readonly catalog: Catalog) {
    this.indexControls(catalog.controls ?? [], [], null, null);
    this.indexGroups(catalog.groups ?? [], []);
  }

  private indexControls(
    controls: Control[],
    groupPath: string[],
    group: Group | null,
    parentId: string | null
  ): void {
    for (const control of controls) {
      if (this.entries.has(control.id)) {
        throw new CatalogIntegrityError(`Control id '${control.id}' appears more than once in the catalog`);
      }
      this.entries.set(control.id, { control, groupPath, group, parentId });
      this.indexControls(control.controls ?? [], groupPath, group, control.id);
    }
  }

  private indexGroups(groups: Group[], parentPath: string[]): void {
    const seen = new Set<string>();
    for (const group of groups) {
      if (seen.has(group.id)) {
        const scope = parentPath.length > 0 ? `group '${parentPath.join('/')}'` : 'the catalog root';
        throw new CatalogIntegrityError(`Group id '${group.id}' appears more than once under ${scope}`);
      }
      seen.add(group.id);

      const groupPath = [...parentPath, group.id];
      this.indexControls(group.controls ?? [], groupPath, group, null);
      this.indexGroups(group.groups ?? [], groupPath);
    }
  }

  getControl(controlId: string): Control {
    return this.getControlEntry(controlId).control;
  }

  getControlEntry(controlId: string): ControlEntry {
    const entry = this.entries.get(controlId);
    if (!entry) {
      throw new NotFoundError('control', controlId);
    }
    return entry;
  }

  hasControl(controlId: string): boolean {
    return this.entries.has(controlId);
  }

  /**
   * Swaps the indexed control with the same id. The catalog tree picks the
   * new object up on the next `updateCatalogControls` or `getCatalog`.
   */
  replaceControl(control: Control): void {
    const entry = this.getControlEntry(control.id);
    entry.control = control;
  }

  updateCatalogControls(): void {
    const swap = (controls: Control[] | undefined): void => {
      if (!controls) {
        return;
      }
      for (let index = 0; index < controls.length; index += 1) {
        const entry = this.entries.get(controls[index].id);
        if (entry) {
          controls[index] = entry.control;
        }
        swap(controls[index].controls);
      }
    };

    swap(this.catalog.controls);
    for (const group of this.getAllGroupsFromCatalog()) {
      swap(group.controls);
    }
  }

  getCatalog(): Catalog {
    this.updateCatalogControls();
    return this.catalog;
  }

  /** A control counts as withdrawn when it or any control it is nested in is. */
  private isEffectivelyWithdrawn(entry: ControlEntry): boolean {
    let current: ControlEntry | undefined = entry;
    while (current) {
      if (isWithdrawn(current.control)) {
        return true;
      }
      current = current.parentId === null ? undefined : this.entries.get(current.parentId);
    }
    return false;
  }

  *getAllControls(includeWithdrawn = true): Generator<ControlEntry> {
    for (const entry of this.entries.values()) {
      if (includeWithdrawn || !this.isEffectivelyWithdrawn(entry)) {
        yield entry;
      }
    }
  }

  getCountOfControlsInCatalog(includeWithdrawn: boolean): number {
    return Array.from(this.getAllControls(includeWithdrawn)).length;
  }

  /** Pre-order walk of the group tree, parents before their children. */
  *getAllGroupsFromCatalog(): Generator<Group> {
    const walk = function* (groups: Group[]): Generator<Group> {
      for (const group of groups) {
        yield group;
        yield* walk(group.groups ?? []);
      }
    };
    yield* walk(this.catalog.groups ?? []);
  }

  deleteWithdrawnControls(): void {
    this.updateCatalogControls();

    const forget = (control: Control): void => {
      this.entries.delete(control.id);
      for (const child of control.controls ?? []) {
        forget(child);
      }
    };

    const prune = (controls: Control[] | undefined): Control[] | undefined => {
      if (!controls) {
        return controls;
      }
      return controls.filter((control) => {
        if (isWithdrawn(control)) {
          forget(control);
          return false;
        }
        if (control.controls) {
          control.controls = prune(control.controls);
        }
        return true;
      });
    };

    this.catalog.controls = prune(this.catalog.controls);
    for (const group of this.getAllGroupsFromCatalog()) {
      group.controls = prune(group.controls);
    }
  }

  /**
   * Folds an edited revision into `base` in place. Parts come from
   * `incoming` but keep the identity of the base parts they match; parameters
   * are narrowed to the ids `incoming` declares and take its values only when
   * `replaceParams` is set; properties and sub-controls stay as they were.
   */
  static mergeControls(base: Control, incoming: Control, replaceParams: boolean): void {
    if (incoming.parts && incoming.parts.length > 0) {
      base.parts = restorePartIdentity(incoming.parts, base.parts ?? [], (part) => part.name);
    } else {
      delete base.parts;
    }

    if (incoming.params === undefined) {
      return;
    }

    const merged = mergeParams(base.params ?? [], incoming.params, replaceParams);
    if (merged.length > 0) {
      base.params = merged;
    } else {
      delete base.params;
    }
  }

  /**
   * Absolute paths of every control markdown file under `markdownDir`,
   * including nested group directories, in a stable natural order.
   */
  static async getSortedControlPaths(markdownDir: string): Promise<string[]> {
    const files = await listMarkdownFiles(markdownDir);
    return files
      .filter((relativePath) => CONTROL_FILE_NAME_PATTERN.test(path.posix.basename(relativePath, '.md')))
      .map((relativePath) => path.join(markdownDir, ...relativePath.split('/')));
  }
}
