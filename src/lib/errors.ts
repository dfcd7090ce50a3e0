export type CipherErrorKind = 'InvalidKey' | 'InvalidPlainText' | 'InvalidCipherText'

export class CipherError extends Error {
  readonly kind: CipherErrorKind

  constructor(kind: CipherErrorKind, message: string) {
    super(message)
    this.name = 'CipherError'
    this.kind = kind
  }
}

export const isCipherError = (value: unknown, kind?: CipherErrorKind): value is CipherError =>
  value instanceof CipherError && (kind === undefined || value.kind === kind)
