/**
 * Routing Layer
 *
 * Compiles path templates and maps a method and path to a registered route.
 */

export {
  compileTemplate,
  matchTemplate,
  splitPath,
  type LiteralSegment,
  type RouteTemplate,
  type TemplateSegment,
  type VariableSegment,
} from './template.ts';
export { Matcher, type MatchableRoute, type RouteMatch } from './matcher.ts';
