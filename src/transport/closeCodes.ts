/** WebSocket close codes used by the protocol (RFC 6455 §7.4.1) */
export const CloseCode = {
  NormalClosure: 1000,
  GoingAway: 1001,
  /** Never sent; reported locally when the connection dropped without a close frame */
  AbnormalClosure: 1006,
  InternalServerError: 1011,
} as const;

export const CLOSE_REASON_MODEL_FAILED = 'ai generation failed';

const CLOSE_CODE_NAMES: Record<number, string> = {
  [CloseCode.NormalClosure]: 'normal closure',
  [CloseCode.GoingAway]: 'going away',
  [CloseCode.AbnormalClosure]: 'abnormal closure',
  [CloseCode.InternalServerError]: 'internal error',
};

export function describeCloseCode(code: number): string {
  return CLOSE_CODE_NAMES[code] ?? `close code ${code}`;
}

/** Closures that end a session without signalling a fault */
export function isGracefulClose(code: number): boolean {
  return code === CloseCode.NormalClosure || code === CloseCode.GoingAway;
}
