export {
  ALPHABET,
  ALPHABET_SIZE,
  CIPHER_PRESETS,
  Cipher,
  evaluateKeyStrength,
  generateExecutionNarrative,
  indicesToText,
  normalizeText,
  randomKey,
  textToIndices,
} from './lib/cipher'
export type { CipherMode, CipherResult, CipherStep } from './lib/cipher'
export { CipherError, isCipherError } from './lib/errors'
export type { CipherErrorKind } from './lib/errors'
export { diagnoseCipherSubmission } from './services/diagnostics'
export type { DiagnosisResult } from './services/diagnostics'
