export type SuccessfulCodecResult<T> = {
  success: true
  value: T
}

export type FailedCodecResult<E = Error> = {
  success: false
  error: E
}

export type CodecResult<T, E = Error> = SuccessfulCodecResult<T> | FailedCodecResult<E>
