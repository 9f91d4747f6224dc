/**
 * Conversation identity and routing metadata.
 */

export interface Session {
  /** Opaque id, a UUID unless supplied by the caller */
  id: string;
  /** Inbound channel, e.g. `api` */
  channel?: string;
  /** Routing target within the channel */
  target?: string;
  /** Display label derived from the first user message */
  name?: string;
  /** User and assistant messages recorded so far */
  messageCount: number;
  createdAt: number;
  active: boolean;
}
