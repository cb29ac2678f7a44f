/**
 * Vehicle plates.
 *
 * @module @brdocs/documents/plate
 */

export {
  PLATE_LENGTH,
  LEGACY_PLATE_PATTERN,
  MERCOSUL_PLATE_PATTERN,
  normalizePlate,
  getPlateVariant,
  validatePlate,
  isMercosulPlate,
  formatPlate,
  convertToMercosul,
  convertToLegacy,
  generatePlate,
  type PlateGenerateOptions,
} from './plate.js';
