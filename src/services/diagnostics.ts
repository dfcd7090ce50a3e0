import { ALPHABET, Cipher } from '../lib/cipher'

const ALPHABET_WITHOUT_YO = ALPHABET.replace('Ё', '')

const normalizeSubmission = (text: string) => text.replace(/\s+/g, '').toUpperCase()

interface VariantOptions {
  alphabet?: string
  direction?: 'add' | 'subtract'
  keyOrder?: 'normal' | 'reversed'
  cycleKey?: boolean
}

// Returns null when a letter has no place in the variant's alphabet
const runVariant = (plaintext: string, key: string, options: VariantOptions): string | null => {
  const alphabet = options.alphabet ?? ALPHABET
  const size = alphabet.length
  const toIndices = (text: string) => Array.from(text, (symbol) => alphabet.indexOf(symbol))
  const textIndices = toIndices(plaintext)
  const keyIndices = toIndices(options.keyOrder === 'reversed' ? [...key].reverse().join('') : key)
  if (textIndices.includes(-1) || keyIndices.includes(-1)) return null

  const sign = options.direction === 'subtract' ? -1 : 1
  return textIndices
    .map((value, i) => {
      const shift = options.cycleKey === false ? keyIndices[0] : keyIndices[i % keyIndices.length]
      return alphabet[(((value + sign * shift) % size) + size) % size]
    })
    .join('')
}

export interface DiagnosisResult {
  matchedPattern: string | null
  message: string
  variantMatched?: string
  expectedOutput: string
  studentOutput: string
  score: number
  tags: string[]
}

interface DiagnoseInput {
  plaintext: string
  key: string
  studentOutput: string
}

const patterns: { code: string; label: string; options: VariantOptions; description: string; credit: number }[] = [
  {
    code: 'subtracted-key',
    label: 'Subtracted the key',
    options: { direction: 'subtract' },
    description: 'Key letters were subtracted, which decrypts instead of encrypting.',
    credit: 0.5,
  },
  {
    code: 'first-key-letter-only',
    label: 'Key not repeated',
    options: { cycleKey: false },
    description: 'Only the first key letter was used, turning the cipher into a Caesar shift.',
    credit: 0.3,
  },
  {
    code: 'reversed-key',
    label: 'Key read backwards',
    options: { keyOrder: 'reversed' },
    description: 'Key letters were applied from last to first.',
    credit: 0.5,
  },
  {
    code: 'alphabet-without-yo',
    label: 'Dropped Ё',
    options: { alphabet: ALPHABET_WITHOUT_YO },
    description: 'Positions were counted in a 32-letter alphabet without Ё.',
    credit: 0.6,
  },
]

export const diagnoseCipherSubmission = (input: DiagnoseInput): DiagnosisResult => {
  const cipher = new Cipher(input.key)
  const { input: plaintext, output: expectedOutput } = cipher.run(input.plaintext, 'encrypt')
  const studentOutput = normalizeSubmission(input.studentOutput)

  if (studentOutput === expectedOutput) {
    return {
      matchedPattern: 'correct',
      message: 'Answer matches expected ciphertext.',
      expectedOutput,
      studentOutput,
      score: 1,
      tags: ['correct'],
    }
  }

  for (const pattern of patterns) {
    const variantOutput = runVariant(plaintext, cipher.keyText, pattern.options)
    if (variantOutput !== null && variantOutput === studentOutput) {
      return {
        matchedPattern: pattern.code,
        variantMatched: pattern.label,
        message: pattern.description,
        expectedOutput,
        studentOutput,
        score: Math.min(1, Math.max(0, pattern.credit)),
        tags: ['incorrect', pattern.code],
      }
    }
  }

  return {
    matchedPattern: null,
    message: 'No known mistake pattern matched. Likely multiple or different errors.',
    expectedOutput,
    studentOutput,
    score: 0,
    tags: ['incorrect', 'unclassified'],
  }
}
