/**
 * An inbound chat line split into the signature (first word) and the
 * arguments after it. Runs of whitespace separate words.
 */
export interface InboundMessage {
  readonly signature: string
  readonly args: ReadonlyArray<string>
}

export function parseMessage(line: string): InboundMessage | undefined {
  const words = line.trim().split(/\s+/).filter(word => word !== '')
  const [signature, ...args] = words
  if (signature === undefined) return undefined
  return { signature, args }
}
