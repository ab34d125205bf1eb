export interface NotificationSink {
  /** Rejects with a DeliveryError when the transport refuses the message. */
  send(subscriberId: string, text: string): Promise<void>;
}
