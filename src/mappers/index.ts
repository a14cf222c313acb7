/**
 * Data mapper exports.
 * Functions for transforming validated request input into domain objects.
 */

export { metricFromInput, profileFromSignIn, readingFromInput, setFromInput } from './inputMapper';
export type { MappingContext } from './inputMapper';
