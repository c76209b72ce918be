import { createEnum } from '../utils/create-enum.js';

const searchPolicy = createEnum(['first-success', 'aggregate'] as const);

/**
 * How the resolution pipeline combines several sources during search
 * - first-success: sources are tried in order, the first non-empty answer wins
 * - aggregate: all sources are queried, results are concatenated in source order
 */
export const SearchPolicy = searchPolicy.object;

export type SearchPolicy = typeof searchPolicy.type;

export const SearchPolicySchema = searchPolicy.schema;

export const SEARCH_POLICIES = searchPolicy.values;
