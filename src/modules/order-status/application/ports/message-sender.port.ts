export interface MessageSenderPort {
  /**
   * Best-effort delivery. Resolves to false on failure (already logged by
   * the adapter); never rejects.
   */
  send(input: { to: string; text: string; requestId: string }): Promise<boolean>;
}
