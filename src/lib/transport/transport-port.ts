/**
 * The two BLE operations the print protocol needs
 *
 * Implementations are bound to an already connected peripheral with
 * notifications enabled on the notify characteristic. Discovery, connection
 * and subscription are the implementation's business, not the driver's.
 */
export interface TransportPort {
  /**
   * Write one frame without response
   *
   * Resolves once the write has left the local queue. A rejection means the
   * write failed and the running job is lost.
   */
  writeWithoutResponse(data: Buffer): Promise<void>;

  /**
   * The inbound notification stream
   *
   * Infinite and not restartable; ends only when the peripheral disconnects.
   */
  notifications(): AsyncIterable<Buffer>;
}
