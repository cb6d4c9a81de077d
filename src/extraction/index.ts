export { parseMetricNumber, SUFFIX_MULTIPLIERS } from './numbers';
export {
  type ExtractionPayload,
  extractField,
  extractFields,
  type FieldExtraction,
  TextPage
} from './strategies';
