import type { ConfigEntryStore } from '../db/repositories/configEntry.repository';
import type { VehicleRecord, VehicleStore } from '../db/repositories/vehicle.repository';
import type { BluelinkClient } from '../integrations/bluelink/client';
import type { BluelinkCar } from '../models/bluelink';
import { describeCar, type EntryOptions, type VehicleDescriptor } from '../models/configEntry';
import { VehicleNotFoundError } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import type { TokenManager } from './tokenManager.service';

export type ResyncResult = {
  added: string[];
  updated: string[];
  disabled: string[];
  reenabled: string[];
  selectedVehicleId: string | null;
  selectedVehicleDisabled: boolean;
};

export type VehicleRegistryOptions = {
  entryId: string;
  client: Pick<BluelinkClient, 'getCarList'>;
  tokenManager: Pick<TokenManager, 'getValidToken'>;
  vehicles: VehicleStore;
  entries: Pick<ConfigEntryStore, 'saveOptions'>;
  logger?: Logger;
};

const descriptorChanged = (stored: VehicleRecord, next: VehicleDescriptor): boolean =>
  stored.nickname !== next.nickname ||
  stored.type !== next.type ||
  stored.rawType !== next.rawType ||
  stored.model !== next.model ||
  stored.swVersion !== next.swVersion;

// The first entry wins when the vendor repeats a car id.
const uniqueCars = (cars: BluelinkCar[]): BluelinkCar[] =>
  cars.filter((car, index) => cars.findIndex((other) => other.carId === car.carId) === index);

/**
 * Reconciles the stored vehicle descriptors of one entry with the vendor's
 * current car list. Vehicles that disappear are disabled, never deleted, and
 * the selected vehicle is never switched implicitly.
 */
export class VehicleRegistry {
  private readonly entryId: string;

  private readonly client: Pick<BluelinkClient, 'getCarList'>;

  private readonly tokenManager: Pick<TokenManager, 'getValidToken'>;

  private readonly vehicles: VehicleStore;

  private readonly entries: Pick<ConfigEntryStore, 'saveOptions'>;

  private readonly log: Logger;

  constructor(options: VehicleRegistryOptions) {
    this.entryId = options.entryId;
    this.client = options.client;
    this.tokenManager = options.tokenManager;
    this.vehicles = options.vehicles;
    this.entries = options.entries;
    this.log = (options.logger ?? rootLogger).child({ component: 'vehicle-registry' });
  }

  async listVehicles(): Promise<VehicleRecord[]> {
    return this.vehicles.listVehicles(this.entryId);
  }

  /**
   * Creates or refreshes the selected vehicle's descriptor. A descriptor that
   * a resync disabled stays disabled unless `confirmed` says `car` comes from
   * a freshly fetched car list.
   */
  async syncSelectedVehicle(
    car: BluelinkCar,
    { confirmed = false }: { confirmed?: boolean } = {},
  ): Promise<{ descriptor: VehicleDescriptor; disabled: boolean }> {
    const descriptor = describeCar(car);
    const stored = (await this.vehicles.listVehicles(this.entryId)).find(
      (record) => record.vehicleId === descriptor.vehicleId,
    );
    const disabled = !confirmed && stored?.disabled === true;

    await this.vehicles.upsertVehicle(this.entryId, descriptor, {
      disabled,
      seenAt: disabled ? null : new Date().toISOString(),
    });
    if (disabled) {
      this.log.warn({ vehicleId: descriptor.vehicleId }, 'selected vehicle stays disabled');
    }
    return { descriptor, disabled };
  }

  async fetchCars(): Promise<BluelinkCar[]> {
    const accessToken = await this.tokenManager.getValidToken();
    return this.client.getCarList(accessToken);
  }

  async resync(options: EntryOptions): Promise<{ result: ResyncResult; options: EntryOptions }> {
    const cars = uniqueCars(await this.fetchCars());
    const stored = await this.vehicles.listVehicles(this.entryId);
    const storedById = new Map(stored.map((record) => [record.vehicleId, record]));
    const fetchedIds = new Set(cars.map((car) => car.carId));
    const seenAt = new Date().toISOString();

    const result: ResyncResult = {
      added: [],
      updated: [],
      disabled: [],
      reenabled: [],
      selectedVehicleId: options.selectedCarId,
      selectedVehicleDisabled: false,
    };

    await Promise.all(
      cars.map(async (car) => {
        const descriptor = describeCar(car);
        const existing = storedById.get(descriptor.vehicleId);

        if (!existing) {
          result.added.push(descriptor.vehicleId);
        } else {
          if (descriptorChanged(existing, descriptor)) {
            result.updated.push(descriptor.vehicleId);
          }
          if (existing.disabled) {
            result.reenabled.push(descriptor.vehicleId);
          }
        }

        await this.vehicles.upsertVehicle(this.entryId, descriptor, { disabled: false, seenAt });
      }),
    );

    const missing = stored.filter(
      (record) => !fetchedIds.has(record.vehicleId) && !record.disabled,
    );
    await Promise.all(
      missing.map(async (record) => {
        result.disabled.push(record.vehicleId);
        await this.vehicles.setVehicleDisabled(this.entryId, record.vehicleId, true);
      }),
    );

    const selectedId = options.selectedCarId;
    result.selectedVehicleDisabled = selectedId !== null && !fetchedIds.has(selectedId);

    const selectedCar = cars.find((car) => car.carId === selectedId);
    const nextOptions: EntryOptions = {
      cars,
      // A vanished selected vehicle keeps its last known details.
      car: selectedCar ?? options.car,
      selectedCarId: selectedId,
    };
    await this.entries.saveOptions(this.entryId, nextOptions);

    this.log.info(
      {
        added: result.added,
        updated: result.updated,
        disabled: result.disabled,
        reenabled: result.reenabled,
        selectedVehicleDisabled: result.selectedVehicleDisabled,
      },
      'vehicle registry synced',
    );

    return { result, options: nextOptions };
  }

  /**
   * Re-discover: validates `carId` against the current car list and makes it
   * the selected vehicle.
   */
  async selectVehicle(options: EntryOptions, carId: string): Promise<EntryOptions> {
    const cars = await this.fetchCars();
    const car = cars.find((candidate) => candidate.carId === carId);
    if (!car) {
      throw new VehicleNotFoundError(`Vehicle ${carId} is not registered on this account`, {
        operation: 'select vehicle',
      });
    }

    await this.syncSelectedVehicle(car, { confirmed: true });
    const nextOptions: EntryOptions = { ...options, cars, car, selectedCarId: car.carId };
    await this.entries.saveOptions(this.entryId, nextOptions);
    this.log.info(
      { previousVehicleId: options.selectedCarId, vehicleId: car.carId },
      'selected vehicle changed',
    );
    return nextOptions;
  }
}
