import { createEnum } from '../utils/create-enum.js';

const translationMode = createEnum(['sub', 'dub', 'raw'] as const);

/**
 * Audio/subtitle variant requested from sources that carry several
 */
export const TranslationMode = translationMode.object;

export type TranslationMode = typeof translationMode.type;

export const TranslationModeSchema = translationMode.schema;

export const TRANSLATION_MODES = translationMode.values;
