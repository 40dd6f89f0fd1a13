import { EventEmitter } from "node:events";
EventEmitter.defaultMaxListeners = 20;

import noble from "@abandonware/noble";
import type { Peripheral, Characteristic } from "@abandonware/noble";
import type { BLEConfig } from "../protocol/interfaces/config.ts";
import { DEFAULT_BLE_CONFIG } from "../protocol/interfaces/defaults.ts";
import type { TransportPort } from "../transport/transport-port.ts";
import { NotificationStream } from "../transport/notification-stream.ts";
import {
  ConnectionError,
  DeviceNotFoundError,
  TransportError,
} from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";
import { normalizeUUID } from "./uuid.ts";

/**
 * Peripheral address as noble reports it; macOS only exposes the id
 */
function addressOf(peripheral: Peripheral): string {
  return peripheral.address || peripheral.id;
}

/**
 * BLE link to an LX-D01 over noble
 *
 * Writes go to the write characteristic without response; notifications
 * from the notify characteristic are queued on a NotificationStream that
 * ends when the peripheral disconnects.
 */
export class BleTransport implements TransportPort {
  private peripheral: Peripheral | null = null;
  private writeCharacteristic: Characteristic | null = null;
  private notifyCharacteristic: Characteristic | null = null;
  private stream = new NotificationStream();
  private isInitialized: boolean = false;

  constructor(
    private deviceAddress: string | null = null,
    private bleConfig: BLEConfig = DEFAULT_BLE_CONFIG,
  ) {}

  get connected(): boolean {
    return this.writeCharacteristic !== null;
  }

  /**
   * Address of the device once found
   */
  get address(): string | null {
    return this.deviceAddress;
  }

  /**
   * Initialize Bluetooth adapter and wait for powered on state
   */
  private async initBluetooth(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    if (Reflect.get(noble, "state") === "poweredOn") {
      this.isInitialized = true;
      return;
    }

    return new Promise((resolve, reject) => {
      const finish = (error?: ConnectionError): void => {
        clearTimeout(timeout);
        noble.removeListener("stateChange", checkState);
        if (error) {
          reject(error);
        } else {
          this.isInitialized = true;
          resolve();
        }
      };

      const timeout = setTimeout(() => {
        finish(new ConnectionError("Bluetooth adapter initialization timeout"));
      }, 10000);

      const checkState = (state: string): void => {
        if (state === "poweredOn") {
          finish();
        } else if (state === "poweredOff") {
          finish(new ConnectionError("Bluetooth adapter is not powered on"));
        } else if (state === "unsupported") {
          finish(new ConnectionError("Bluetooth is not supported on this device"));
        } else if (state === "unauthorized") {
          finish(new ConnectionError("Bluetooth access not authorized"));
        }
      };

      noble.on("stateChange", checkState);
    });
  }

  /**
   * Scan until a peripheral matches or the scan timeout elapses
   */
  private scan(
    matches: (peripheral: Peripheral) => boolean,
  ): Promise<Peripheral | null> {
    return new Promise((resolve) => {
      const finish = (peripheral: Peripheral | null): void => {
        clearTimeout(timeoutId);
        noble.removeListener("discover", onDiscover);
        noble
          .stopScanningAsync()
          .catch((error: unknown) => logger.debug(`Stop scanning failed: ${error}`))
          .finally(() => resolve(peripheral));
      };

      const timeoutId = setTimeout(
        () => finish(null),
        this.bleConfig.scanTimeout * 1000,
      );

      const onDiscover = (peripheral: Peripheral): void => {
        if (matches(peripheral)) {
          finish(peripheral);
        }
      };

      noble.on("discover", onDiscover);
      noble.startScanningAsync([], false).catch((error: unknown) => {
        logger.error(`Scan error: ${error}`);
        finish(null);
      });
    });
  }

  /**
   * Scan for the printer by name
   * @returns Device address or null if not found
   */
  public async findDevice(): Promise<string | null> {
    await this.initBluetooth();

    logger.info("Starting device scan...", LogEventType.SCAN_START);
    const wanted = this.bleConfig.deviceName.toLowerCase();
    const peripheral = await this.scan((candidate) => {
      const name = candidate.advertisement.localName;
      return name !== undefined && name.toLowerCase().includes(wanted);
    });

    if (!peripheral) {
      return null;
    }

    const address = addressOf(peripheral);
    logger.info(
      `Found device: ${peripheral.advertisement.localName} (${address})`,
      LogEventType.DEVICE_FOUND,
      { name: peripheral.advertisement.localName, address },
    );
    this.peripheral = peripheral;
    this.deviceAddress = address;
    return address;
  }

  /**
   * Connect, discover the print characteristics and subscribe to
   * notifications
   *
   * @throws {DeviceNotFoundError} If no matching device answers the scan
   * @throws {ConnectionError} If the link or characteristics cannot be set up
   */
  public async connect(): Promise<void> {
    // The previous stream ended with its link
    this.stream = new NotificationStream();

    try {
      await this.initBluetooth();
      const peripheral = await this.locate();

      logger.info("Connecting to device...", LogEventType.CONNECT_START);
      await peripheral.connectAsync();
      logger.info("Connected to device", LogEventType.CONNECTED);

      peripheral.once("disconnect", () => {
        logger.info("Device disconnected");
        this.peripheral = null;
        this.writeCharacteristic = null;
        this.notifyCharacteristic = null;
        this.stream.end();
      });

      const notify = await this.discoverCharacteristics(peripheral);

      // Subscribing is what makes the printer send its status frame
      notify.on("data", (data: Buffer) => this.stream.push(data));
      await notify.subscribeAsync();
    } catch (error) {
      logger.error(`Connection error: ${error}`);
      await this.disconnect();

      if (error instanceof DeviceNotFoundError || error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(
        `Connection failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async locate(): Promise<Peripheral> {
    if (this.peripheral) {
      return this.peripheral;
    }

    if (!this.deviceAddress) {
      const address = await this.findDevice();
      if (!address || !this.peripheral) {
        throw new DeviceNotFoundError(
          `Could not find '${this.bleConfig.deviceName}'`,
        );
      }
      return this.peripheral;
    }

    logger.info("Scanning for device by address...", LogEventType.SCAN_START);
    const wanted = this.deviceAddress.toLowerCase();
    const peripheral = await this.scan(
      (candidate) => addressOf(candidate).toLowerCase() === wanted,
    );
    if (!peripheral) {
      throw new DeviceNotFoundError(
        `Could not find device with address '${this.deviceAddress}'`,
      );
    }

    logger.info(`Found device: ${addressOf(peripheral)}`, LogEventType.DEVICE_FOUND, {
      name: peripheral.advertisement.localName,
      address: addressOf(peripheral),
    });
    this.peripheral = peripheral;
    return peripheral;
  }

  /**
   * Discover required characteristics on the device
   * @returns The notify characteristic
   */
  private async discoverCharacteristics(
    peripheral: Peripheral,
  ): Promise<Characteristic> {
    const { services } =
      await peripheral.discoverAllServicesAndCharacteristicsAsync();

    const writeUuid = normalizeUUID(this.bleConfig.writeCharacteristicUUID);
    const notifyUuid = normalizeUUID(this.bleConfig.notifyCharacteristicUUID);
    const serviceUuid = normalizeUUID(this.bleConfig.serviceUUID);

    logger.debug(`Looking for write UUID: ${writeUuid}`);
    logger.debug(`Looking for notify UUID: ${notifyUuid}`);

    for (const service of services) {
      logger.debug(`Service: ${service.uuid}`);
      if (normalizeUUID(service.uuid) !== serviceUuid) {
        continue;
      }

      for (const char of service.characteristics) {
        const charUuid = normalizeUUID(char.uuid);
        logger.debug(`  Characteristic: ${char.uuid} (normalized: ${charUuid})`);

        if (charUuid === writeUuid) {
          this.writeCharacteristic = char;
          logger.debug(
            `Found write characteristic: ${char.uuid}`,
            LogEventType.DISCOVER_CHAR,
            { type: "write", uuid: char.uuid },
          );
        }
        if (charUuid === notifyUuid) {
          this.notifyCharacteristic = char;
          logger.debug(
            `Found notify characteristic: ${char.uuid}`,
            LogEventType.DISCOVER_CHAR,
            { type: "notify", uuid: char.uuid },
          );
        }
      }
    }

    if (!this.writeCharacteristic || !this.notifyCharacteristic) {
      throw new ConnectionError("Could not find required characteristics");
    }
    return this.notifyCharacteristic;
  }

  /**
   * Write one frame without response. Resolves once noble has queued it.
   */
  public async writeWithoutResponse(data: Buffer): Promise<void> {
    if (!this.writeCharacteristic) {
      throw new TransportError("BLE transport not connected");
    }
    await this.writeCharacteristic.writeAsync(data, true);
  }

  public notifications(): AsyncIterable<Buffer> {
    return this.stream;
  }

  /**
   * Disconnect from the device and end the notification stream
   */
  public async disconnect(): Promise<void> {
    const warn = (step: string) => (error: unknown) =>
      logger.warning(`Error during disconnect (${step}): ${error}`);

    if (this.notifyCharacteristic) {
      this.notifyCharacteristic.removeAllListeners();
      await this.notifyCharacteristic.unsubscribeAsync().catch(warn("unsubscribe"));
    }
    if (this.peripheral) {
      this.peripheral.removeAllListeners();
      await this.peripheral.disconnectAsync().catch(warn("disconnect"));
    }

    noble.removeAllListeners();
    await noble.stopScanningAsync().catch(warn("stop scanning"));

    this.peripheral = null;
    this.writeCharacteristic = null;
    this.notifyCharacteristic = null;
    this.stream.end();
  }
}
