export {
  entityToDocument,
  toDocument,
  fromDocument,
  serializeRun,
  deserializeRun,
  DEFAULT_INDENT,
  type SerializeOptions,
} from './document.js';
