export {
  MIN_MESSAGES,
  MAX_MESSAGES,
  DEFAULT_MESSAGE_COUNT,
  DIRECT_ACKNOWLEDGEMENT,
  isValidMessageCount,
  parseMessageCount,
  canAutoFill,
  buildDirectContent,
} from './direct.js';

export {
  GUIDED_PREAMBLE,
  GUIDED_CONTENT_OPEN,
  GUIDED_CONTENT_CLOSE,
  GUIDED_CLOSING_PREFIX,
  GUIDED_CLOSING_SUFFIX,
  buildGuidedContent,
} from './guided.js';

export { PACKAGING_MODES, isPackagingMode, type PackagingMode, type GuidedInput } from './types.js';
