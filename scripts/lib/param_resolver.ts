import type { Control, Parameter, Profile, SetParameter } from './catalog_model.js';

export const PARAMETER_REPS = [
  'raw',
  'value-or-label-or-choices',
  'label-or-choices',
  'assignment-form'
] as const;

export type ParameterRep = (typeof PARAMETER_REPS)[number];

export const DEFAULT_VALUE_SEPARATOR = ', ';

const PARAM_INSERT_PATTERN = /\{\{\s*insert:\s*param,\s*([^\s}]+)\s*\}\}/g;

/**
 * Every set-parameter declared by the profile, keyed by parameter id. A later
 * declaration for the same id replaces an earlier one.
 */
export function getFullProfileParamDict(profile: Profile): Map<string, SetParameter> {
  const dict = new Map<string, SetParameter>();
  for (const setting of profile.modify?.['set-parameters'] ?? []) {
    dict.set(setting['param-id'], setting);
  }
  return dict;
}

function applySetting(param: Parameter, setting: SetParameter): Parameter {
  const next: Parameter = { ...param };
  if (setting.label !== undefined) {
    next.label = setting.label;
  }
  if (setting.values !== undefined) {
    next.values = [...setting.values];
  }
  if (setting.select !== undefined) {
    next.select = { ...setting.select };
  }
  return next;
}

export function getProfileParamDict(
  control: Control,
  fullDict: Map<string, SetParameter>,
  valuesOnly = false
): Map<string, Parameter> {
  const dict = new Map<string, Parameter>();

  for (const param of control.params ?? []) {
    const setting = fullDict.get(param.id);
    const resolved = setting ? applySetting(param, setting) : param;

    if (valuesOnly && (resolved.values ?? []).length === 0) {
      continue;
    }
    dict.set(param.id, resolved);
  }

  return dict;
}

function choicesToStr(param: Parameter): string | null {
  const choices = param.select?.choice ?? [];
  if (choices.length === 0) {
    return null;
  }
  return `[${choices.join('; ')}]`;
}

export function paramToStr(
  param: Parameter,
  rep: ParameterRep = 'value-or-label-or-choices',
  separator = DEFAULT_VALUE_SEPARATOR
): string {
  const values = param.values ?? [];
  const label = param.label?.trim() ? param.label : null;

  if (rep === 'raw') {
    return `{{ insert: param, ${param.id} }}`;
  }

  if (rep === 'value-or-label-or-choices') {
    if (values.length > 0) {
      return values.join(separator);
    }
    return label ?? choicesToStr(param) ?? param.id;
  }

  if (rep === 'label-or-choices') {
    return label ?? choicesToStr(param) ?? param.id;
  }

  if (values.length > 0) {
    return values.join(separator);
  }
  if (label) {
    return `[Assignment: ${label}]`;
  }
  const choices = param.select?.choice ?? [];
  if (choices.length > 0) {
    return `[Selection: ${choices.join('; ')}]`;
  }
  return `[Assignment: ${param.id}]`;
}

/**
 * Replaces `{{ insert: param, <id> }}` markers with the display form of the
 * parameter. Unknown ids are left as written.
 */
export function substituteParams(
  prose: string,
  params: Map<string, Parameter>,
  rep: ParameterRep,
  separator = DEFAULT_VALUE_SEPARATOR
): string {
  if (rep === 'raw') {
    return prose;
  }

  return prose.replace(PARAM_INSERT_PATTERN, (marker: string, id: string) => {
    const param = params.get(id);
    return param ? paramToStr(param, rep, separator) : marker;
  });
}
