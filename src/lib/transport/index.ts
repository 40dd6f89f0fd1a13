export type { TransportPort } from "./transport-port.ts";
export { NotificationStream } from "./notification-stream.ts";
export { FrameInbox, type InboxEvent } from "./frame-inbox.ts";
export { NotificationPump } from "./notification-pump.ts";
export {
  CapturingTransport,
  type CapturedFrame,
} from "./capturing-transport.ts";
