import {
  IDENTITY_TEMPLATE,
  QUERY_PLACEHOLDER,
} from '../../config/constants.js';
import { getErrorMessage, logger } from '../errors.js';
import type { TemplateCatalog } from './catalog.js';

// `{{` and `}}` stand for literal braces.
const TEMPLATE_TOKEN_RE = /\{\{|\}\}|\{(\w+)\}/g;

export class TemplateFormatError extends Error {
  readonly missingKey: string;

  constructor(missingKey: string) {
    super(`Template placeholder {${missingKey}} has no value`);
    this.name = 'TemplateFormatError';
    this.missingKey = missingKey;
  }
}

/**
 * Substitutes `{name}` placeholders in a single pass and turns `{{` and `}}`
 * into single braces. Substituted values are not re-scanned, so a value may
 * itself contain `{query}`.
 */
export function formatTemplate(
  template: string,
  values: Readonly<Record<string, string>>
): string {
  return template.replace(
    TEMPLATE_TOKEN_RE,
    (match, key: string | undefined) => {
      if (key === undefined) return match.charAt(0);
      const value = Object.hasOwn(values, key) ? values[key] : undefined;
      if (value === undefined) throw new TemplateFormatError(key);
      return value;
    }
  );
}

export function hasQueryPlaceholder(template: string): boolean {
  for (const [token] of template.matchAll(TEMPLATE_TOKEN_RE)) {
    if (token === QUERY_PLACEHOLDER) return true;
  }
  return false;
}

export function ensureQueryPlaceholder(template: string): string {
  return hasQueryPlaceholder(template) ? template : IDENTITY_TEMPLATE;
}

export function composeTemplate(
  role: string,
  technique: string | null,
  catalog: TemplateCatalog
): string {
  const roleTemplate = catalog.roleTemplate(role);
  if (!technique) return ensureQueryPlaceholder(roleTemplate);

  const techniqueTemplate = catalog.techniqueTemplate(technique);
  try {
    return ensureQueryPlaceholder(
      formatTemplate(techniqueTemplate, { query: roleTemplate, role })
    );
  } catch (error) {
    logger.warn(
      { role, technique, reason: getErrorMessage(error) },
      'Template composition failed; using role template'
    );
    return ensureQueryPlaceholder(roleTemplate);
  }
}

export function renderPrompt(
  template: string,
  query: string,
  role: string
): string {
  return formatTemplate(template, { query, role });
}
