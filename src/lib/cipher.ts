import { nanoid } from 'nanoid'
import { CipherError, type CipherErrorKind } from './errors'

export type CipherMode = 'encrypt' | 'decrypt'

export interface CipherStep {
  position: number
  inputSymbol: string
  inputIndex: number
  keySymbol: string
  keyIndex: number
  outputIndex: number
  outputSymbol: string
}

export interface CipherResult {
  id: string
  mode: CipherMode
  input: string
  output: string
  keyText: string
  steps: CipherStep[]
}

export const ALPHABET = 'АБВГДЕЁЖЗИЙКЛМНОПРСТУФХЦЧШЩЪЫЬЭЮЯ'
export const ALPHABET_SIZE = ALPHABET.length

// Ё sits at U+0401, А..Я at U+0410..U+042F
const LOOKUP_BASE = 0x400
const LOOKUP = (() => {
  const table = new Int8Array(0x30).fill(-1)
  for (let i = 0; i < ALPHABET_SIZE; i += 1) {
    table[ALPHABET.charCodeAt(i) - LOOKUP_BASE] = i
  }
  return table
})()

const indexOfSymbol = (symbol: string): number => {
  if (symbol.length !== 1) return -1
  const offset = symbol.charCodeAt(0) - LOOKUP_BASE
  return offset >= 0 && offset < LOOKUP.length ? LOOKUP[offset] : -1
}

const wrap = (value: number): number => ((value % ALPHABET_SIZE) + ALPHABET_SIZE) % ALPHABET_SIZE

export const normalizeText = (text: string): string => text.toUpperCase()

const validateText = (text: string, kind: CipherErrorKind, subject: string): string => {
  const normalized = normalizeText(text)
  if (!normalized) throw new CipherError(kind, `${subject} must not be empty`)
  for (const symbol of normalized) {
    if (indexOfSymbol(symbol) < 0) {
      throw new CipherError(kind, `${subject} contains a character outside the alphabet: "${symbol}"`)
    }
  }
  return normalized
}

export const textToIndices = (text: string): number[] =>
  Array.from(text, (symbol) => {
    const index = indexOfSymbol(symbol)
    if (index < 0) throw new RangeError(`Symbol "${symbol}" is not in the alphabet`)
    return index
  })

export const indicesToText = (indices: readonly number[]): string =>
  indices.map((index) => ALPHABET[wrap(index)]).join('')

export class Cipher {
  readonly keyText: string
  private readonly keyIndices: readonly number[]

  constructor(keyText: string) {
    this.keyText = validateText(keyText, 'InvalidKey', 'Key')
    this.keyIndices = Object.freeze(textToIndices(this.keyText))
  }

  get key(): readonly number[] {
    return this.keyIndices
  }

  encrypt(openText: string): string {
    const indices = textToIndices(validateText(openText, 'InvalidPlainText', 'Plain text'))
    return indicesToText(this.shift(indices, 'encrypt'))
  }

  decrypt(cipherText: string): string {
    const indices = textToIndices(validateText(cipherText, 'InvalidCipherText', 'Cipher text'))
    return indicesToText(this.shift(indices, 'decrypt'))
  }

  /** Same transform as encrypt/decrypt, keeping every per-letter step for display. */
  run(text: string, mode: CipherMode): CipherResult {
    const input =
      mode === 'encrypt'
        ? validateText(text, 'InvalidPlainText', 'Plain text')
        : validateText(text, 'InvalidCipherText', 'Cipher text')
    const inputIndices = textToIndices(input)
    const outputIndices = this.shift(inputIndices, mode)
    const steps = inputIndices.map((inputIndex, position): CipherStep => {
      const keyIndex = this.keyAt(position)
      const outputIndex = outputIndices[position]
      return {
        position,
        inputSymbol: ALPHABET[inputIndex],
        inputIndex,
        keySymbol: ALPHABET[keyIndex],
        keyIndex,
        outputIndex,
        outputSymbol: ALPHABET[outputIndex],
      }
    })
    return {
      id: nanoid(),
      mode,
      input,
      output: indicesToText(outputIndices),
      keyText: this.keyText,
      steps,
    }
  }

  private keyAt(position: number): number {
    return this.keyIndices[position % this.keyIndices.length]
  }

  private shift(indices: readonly number[], mode: CipherMode): number[] {
    return mode === 'encrypt'
      ? indices.map((value, i) => (value + this.keyAt(i)) % ALPHABET_SIZE)
      : indices.map((value, i) => (value - this.keyAt(i) + ALPHABET_SIZE) % ALPHABET_SIZE)
  }
}

export const generateExecutionNarrative = (result: CipherResult): string[] => {
  const operator = result.mode === 'encrypt' ? '+' : '-'
  const messages = [
    `${result.mode === 'encrypt' ? 'Encrypting' : 'Decrypting'} ${result.input.length} letters with key ${result.keyText} (period ${result.keyText.length}).`,
  ]
  result.steps.forEach((step) => {
    messages.push(
      `Step ${step.position + 1}: ${step.inputSymbol}(${step.inputIndex}) ${operator} ${step.keySymbol}(${step.keyIndex}) mod ${ALPHABET_SIZE} = ${step.outputSymbol}(${step.outputIndex})`,
    )
  })
  messages.push(`Produced ${result.output}.`)
  return messages
}

const hasShorterPeriod = (text: string): boolean => {
  for (let period = 1; period < text.length; period += 1) {
    if (text.length % period === 0 && text.slice(0, period).repeat(text.length / period) === text) {
      return true
    }
  }
  return false
}

export const evaluateKeyStrength = (keyText: string): { label: 'Weak' | 'Moderate' | 'Strong'; score: number } => {
  const normalized = validateText(keyText, 'InvalidKey', 'Key')
  const uniqueLetters = new Set(normalized).size
  const penalty = hasShorterPeriod(normalized) ? 3 : 0
  const score = Math.max(0, uniqueLetters + Math.min(normalized.length, 10) - penalty)
  if (score >= 12) return { label: 'Strong', score }
  if (score >= 6) return { label: 'Moderate', score }
  return { label: 'Weak', score }
}

export const randomKey = (length = 8, random: () => number = Math.random): string => {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`Key length must be a positive integer, got ${length}`)
  }
  return Array.from({ length }, () => ALPHABET[Math.floor(random() * ALPHABET_SIZE) % ALPHABET_SIZE]).join('')
}

export const CIPHER_PRESETS = {
  basic: {
    label: 'Basic Example',
    plaintext: 'ТЕКСТ',
    key: 'КЛЮЧ',
    description: 'Short key over a short word, enough to see every addition.',
  },
  cycling: {
    label: 'Key Cycling',
    plaintext: 'АААААА',
    key: 'БВ',
    description: 'A two-letter key repeating across a run of identical letters.',
  },
  wrapAround: {
    label: 'Wrap Around',
    plaintext: 'ЯЁЖ',
    key: 'ЯЯ',
    description: 'Sums past the end of the alphabet wrap back to its start.',
  },
} as const
