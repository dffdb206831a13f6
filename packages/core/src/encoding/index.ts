export {
  encodeParameters,
  encodeQuery,
  appendQuery,
} from './parameter-encoder.js';
export type { EncodedRequest } from './parameter-encoder.js';
export { pngPart, jpegPart, customPart } from './form-data-part.js';
export type { FormDataPart } from './form-data-part.js';
export { parameterValueSchema } from './parameters.js';
export type {
  ParameterScalar,
  ParameterValue,
  ParameterMap,
} from './parameters.js';
