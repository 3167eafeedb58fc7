/**
 * Errors barrel exports
 */

export {
  ExtractorError,
  ConfigurationError,
  EncodingError,
  TransportError,
  ApiError,
  ParseError,
  FileWriteError,
} from "./extractorErrors";
