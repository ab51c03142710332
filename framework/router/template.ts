/**
 * Route Templates
 *
 * Compiles path templates such as `/users/:id(\d+)/files/:path*` into an
 * immutable list of literal and variable segments. Literals are stored
 * decoded and compared against decoded path segments.
 */

import { ConfigurationError } from '../errors.ts';

export interface LiteralSegment {
  readonly kind: 'literal';
  readonly value: string;
}

export interface VariableSegment {
  readonly kind: 'variable';
  readonly name: string;
  readonly constraint?: RegExp;
  /** Captures the remaining path; only allowed as the last segment */
  readonly rest: boolean;
}

export type TemplateSegment = LiteralSegment | VariableSegment;

export interface RouteTemplate {
  readonly source: string;
  readonly segments: readonly TemplateSegment[];
}

// :name, :name(regex), :name*
const VARIABLE = /^:([A-Za-z_$][\w$]*)(?:\((.+)\))?(\*)?$/;

/**
 * Split a path into its non-empty segments
 */
export function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment !== '');
}

/**
 * Compile a path template
 */
export function compileTemplate(source: string): RouteTemplate {
  const parts = splitPath(source);
  const seen = new Set<string>();

  const segments = parts.map((part, index): TemplateSegment => {
    if (!part.startsWith(':')) {
      return Object.freeze({ kind: 'literal', value: decodeSegment(part) });
    }

    const match = VARIABLE.exec(part);
    if (!match) {
      throw new ConfigurationError(`Invalid variable segment "${part}" in template "${source}"`);
    }

    const [, name, pattern, star] = match;
    if (seen.has(name)) {
      throw new ConfigurationError(`Duplicate variable "${name}" in template "${source}"`);
    }
    seen.add(name);

    const rest = star === '*';
    if (rest && index !== parts.length - 1) {
      throw new ConfigurationError(`Rest variable "${name}" must be the last segment of "${source}"`);
    }

    let constraint: RegExp | undefined;
    if (pattern !== undefined) {
      try {
        constraint = new RegExp(`^(?:${pattern})$`);
      } catch (error) {
        throw new ConfigurationError(`Invalid constraint for "${name}" in template "${source}"`, {
          cause: error,
        });
      }
    }

    return Object.freeze({ kind: 'variable', name, constraint, rest });
  });

  return Object.freeze({ source, segments: Object.freeze(segments) });
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Match path segments against a template.
 * Returns variables in declaration order, or null when the structure differs.
 */
export function matchTemplate(
  template: RouteTemplate,
  pathSegments: readonly string[]
): Record<string, string> | null {
  const params: Record<string, string> = {};
  const { segments } = template;
  let i = 0;

  for (; i < segments.length; i++) {
    const segment = segments[i];

    if (segment.kind === 'variable' && segment.rest) {
      const remainder = pathSegments.slice(i).map(decodeSegment).join('/');
      if (segment.constraint && !segment.constraint.test(remainder)) {
        return null;
      }
      params[segment.name] = remainder;
      return params;
    }

    if (i >= pathSegments.length) {
      return null;
    }

    const value = pathSegments[i];
    if (segment.kind === 'literal') {
      if (segment.value !== decodeSegment(value)) return null;
      continue;
    }

    const decoded = decodeSegment(value);
    if (segment.constraint && !segment.constraint.test(decoded)) {
      return null;
    }
    params[segment.name] = decoded;
  }

  return i === pathSegments.length ? params : null;
}
