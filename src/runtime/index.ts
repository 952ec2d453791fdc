/**
 * Runtime primitives shared by every generated binding.
 */

export { lazyCodec, type Codec, type ObjectCodec } from './Codec.js';
export { ID_PROPERTY, Identified, objectIdOf } from './ObjectId.js';
export { OrLeft, OrRight, left, right, orCodec, type Or } from './Or.js';
export { Remote, Inline, remotableCodec, type Remotable } from './Remotable.js';
export {
  LangContainer,
  languageMapCodec,
  mergeLanguageMaps,
  type LanguageMap,
} from './LangContainer.js';
export {
  PROPERTY_KINDS,
  decodeOneOrMany,
  encodeOneOrMany,
  sequenceCodec,
  optionalCodec,
  type PropertyKind,
} from './Property.js';
export {
  stringCodec,
  numberCodec,
  integerCodec,
  booleanCodec,
  uriCodec,
  jsonCodec,
  isIdentifier,
} from './scalars.js';
export { VocabObject, Variant } from './VocabObject.js';
