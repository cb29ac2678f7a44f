/**
 * PIS/PASEP (national insurance number).
 *
 * @module @brdocs/documents/pis
 */

export { PIS_LENGTH, PIS_WEIGHTS } from './constants.js';
export { validatePis, formatPis, generatePis, type PisGenerateOptions } from './pis.js';
