/**
 * Parameter Resolution
 */

export { convertValue, ParameterResolver, type ResolutionContext } from './resolver.ts';
export {
  attributeProvider,
  BuiltinMarkers,
  bodyProvider,
  fieldProvider,
  headerProvider,
  injectProvider,
  pathProvider,
  queryProvider,
  registerBuiltinProviders,
  requestProvider,
} from './providers.ts';
