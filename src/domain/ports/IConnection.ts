/**
 * Minimal capability the reconnection controller needs from a transport.
 * Implementations must tolerate terminate() being called while establish()
 * or awaitDrop() is still pending.
 */
export interface IConnection {
  /** Brings the connection up; rejects if it cannot be established */
  establish(): Promise<void>;

  /**
   * Settles once the connection is lost: resolves on a clean drop, rejects on failure.
   * Must settle promptly after terminate() is called.
   */
  awaitDrop(): Promise<void>;

  /** Tears the connection down; rejects if teardown itself failed */
  terminate(): Promise<void>;
}
