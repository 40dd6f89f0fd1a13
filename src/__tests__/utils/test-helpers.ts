import { expect } from "vitest";
import type { TransportPort } from "../../lib/transport/transport-port.ts";
import { NotificationStream } from "../../lib/transport/notification-stream.ts";
import { formatHex } from "../../lib/protocol/format.ts";
import {
  COMPLETION_ACK_TOKEN,
  CONTROL_MARKER,
  DATA_MARKER,
} from "../../lib/protocol/constants.ts";
import { Opcode } from "../../lib/protocol/opcodes.ts";
import { ControlFrameBuilder } from "../../lib/protocol/builders/control-frame.ts";

/**
 * Parse "5A 04 3A 00" or "5a043a00" into a Buffer
 */
export function hexToBuffer(hex: string): Buffer {
  return Buffer.from(hex.replace(/\s+/g, ""), "hex");
}

/**
 * Assert a buffer's bytes against a hex string (spaces ignored)
 */
export function expectHex(actual: Uint8Array, expected: string): void {
  expect(formatHex(actual)).toBe(formatHex(hexToBuffer(expected)));
}

export function isControlFrame(frame: Buffer): boolean {
  return frame[0] === CONTROL_MARKER;
}

export function isDataFrame(frame: Buffer): boolean {
  return frame[0] === DATA_MARKER;
}

/**
 * Let pending promise callbacks run
 */
export async function flushMicrotasks(rounds: number = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}

export interface FakePrinterBehavior {
  /** Notify STATUS as soon as the first notification is consumed */
  sendStatus?: boolean;
  /** Echo START frames back, as the real device does */
  echoStart?: boolean;
  /** Notify COMPLETE after the last data block */
  complete?: boolean;
  /** COMPLETE frames sent in reply to the ack */
  repeatsAfterAck?: number;
}

/**
 * In-process stand-in for an LX-D01 behind a connected transport
 *
 * Records every write and reacts to START/data/ack frames the way the
 * printer does in captures. Writes resolve immediately unless `writeHook`
 * says otherwise.
 */
export class FakePrinterTransport implements TransportPort {
  readonly written: Buffer[] = [];
  stream = new NotificationStream();

  /** Replaces the default immediate write confirmation */
  writeHook: ((frame: Buffer, index: number) => Promise<void>) | null = null;

  private expectedBlocks = 0;
  private copies = 1;
  private blocksSeen = 0;

  constructor(private behavior: FakePrinterBehavior = {}) {
    if (behavior.sendStatus) {
      this.notify(ControlFrameBuilder.build(Opcode.STATUS, 0x0180, 0x0064));
    }
  }

  writeWithoutResponse(data: Buffer): Promise<void> {
    const index = this.written.length;
    this.written.push(Buffer.from(data));
    this.react(data);
    return this.writeHook ? this.writeHook(data, index) : Promise.resolve();
  }

  notifications(): AsyncIterable<Buffer> {
    return this.stream;
  }

  notify(frame: Uint8Array | string): void {
    this.stream.push(typeof frame === "string" ? hexToBuffer(frame) : frame);
  }

  disconnect(): void {
    this.stream.end();
  }

  /** Start a new link with its own notification stream */
  reconnect(): void {
    this.stream = new NotificationStream();
  }

  get controlFrames(): Buffer[] {
    return this.written.filter(isControlFrame);
  }

  get dataFrames(): Buffer[] {
    return this.written.filter(isDataFrame);
  }

  private react(frame: Buffer): void {
    if (isDataFrame(frame)) {
      this.blocksSeen++;
      if (this.behavior.complete && this.blocksSeen === this.expectedBlocks) {
        this.notify(
          ControlFrameBuilder.build(Opcode.COMPLETE, this.expectedBlocks, this.copies),
        );
      }
      return;
    }

    if (frame[1] !== Opcode.START || frame.length < 6) {
      return;
    }

    const w1 = frame.readUInt16LE(2);
    const w2 = frame.readUInt16LE(4);
    if (w2 === COMPLETION_ACK_TOKEN) {
      for (let i = 0; i < (this.behavior.repeatsAfterAck ?? 0); i++) {
        this.notify(ControlFrameBuilder.build(Opcode.COMPLETE, w1, this.copies));
      }
      return;
    }

    this.expectedBlocks = w1;
    this.copies = w2;
    this.blocksSeen = 0;
    if (this.behavior.echoStart) {
      this.notify(Buffer.from(frame));
    }
  }
}
