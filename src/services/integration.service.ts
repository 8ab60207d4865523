import {
  TOKEN_MAINTENANCE_INTERVAL_MS,
  type BluelinkConfig,
} from '../config/bluelinkConfig';
import type { ConfigEntryStore } from '../db/repositories/configEntry.repository';
import type { VehicleRecord, VehicleStore } from '../db/repositories/vehicle.repository';
import type { BluelinkClient } from '../integrations/bluelink/client';
import type { BluelinkCar } from '../models/bluelink';
import {
  describeCar,
  isEvCapableCarType,
  type ConfigEntry,
  type EntryOptions,
} from '../models/configEntry';
import { notFoundError } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import {
  buildButtonStates,
  buildEntityStates,
  type ButtonState,
  type EntityState,
} from './entities.service';
import type { NotificationCenter } from './notification.service';
import type { FlowCompletion } from './oauthFlow.service';
import { PollingCoordinator, type JobStatus } from './pollingCoordinator.service';
import { buildPollingJobs } from './pollingJobs';
import { SnapshotStore } from './snapshotStore';
import { TokenManager, type TokenState } from './tokenManager.service';
import { VehicleRegistry, type ResyncResult } from './vehicleRegistry.service';

export type EntryRuntime = {
  entryId: string;
  title: string;
  options: EntryOptions;
  tokenManager: TokenManager;
  snapshot: SnapshotStore;
  registry: VehicleRegistry;
  coordinator: PollingCoordinator | null;
  selectedVehicleDisabled: boolean;
  maintenanceTimer: NodeJS.Timeout | null;
  log: Logger;
};

export type EntrySummary = {
  entryId: string;
  title: string;
  tokenState: TokenState;
  selectedVehicleId: string | null;
  vehicleName: string | null;
  selectedVehicleDisabled: boolean;
  polling: boolean;
  vehicles: VehicleRecord[];
};

export type EntryEntities = {
  entryId: string;
  vehicleId: string | null;
  sensors: EntityState[];
  buttons: ButtonState[];
};

export type SetupOptions = {
  // Without timers the runtime only serves manual refreshes.
  startPolling?: boolean;
};

export type IntegrationServiceOptions = {
  config: BluelinkConfig;
  client: BluelinkClient;
  entries: ConfigEntryStore;
  vehicles: VehicleStore;
  notifications: NotificationCenter;
  logger?: Logger;
};

export const resolveSelectedCar = (options: EntryOptions): BluelinkCar | null => {
  if (options.car && (!options.selectedCarId || options.car.carId === options.selectedCarId)) {
    return options.car;
  }

  return options.cars.find((car) => car.carId === options.selectedCarId) ?? null;
};

/**
 * Owns one isolated runtime per config entry: its token manager, snapshot,
 * polling coordinator, registry sync and maintenance timer.
 */
export class IntegrationService {
  private readonly config: BluelinkConfig;

  private readonly client: BluelinkClient;

  private readonly entries: ConfigEntryStore;

  private readonly vehicles: VehicleStore;

  private readonly notifications: NotificationCenter;

  private readonly log: Logger;

  private readonly runtimes = new Map<string, EntryRuntime>();

  constructor(options: IntegrationServiceOptions) {
    this.config = options.config;
    this.client = options.client;
    this.entries = options.entries;
    this.vehicles = options.vehicles;
    this.notifications = options.notifications;
    this.log = (options.logger ?? rootLogger).child({ component: 'integration' });
  }

  async setupAll(options: SetupOptions = {}): Promise<EntryRuntime[]> {
    const entries = await this.entries.listEntries();
    const results = await Promise.allSettled(
      entries.map((entry) => this.setupEntry(entry.entryId, options)),
    );

    return results.reduce<EntryRuntime[]>((accumulator, result, index) => {
      if (result.status === 'fulfilled') {
        accumulator.push(result.value);
      } else {
        this.log.error(
          { entryId: entries[index].entryId, err: result.reason },
          'config entry setup failed',
        );
      }
      return accumulator;
    }, []);
  }

  async setupEntry(entryId: string, options: SetupOptions = {}): Promise<EntryRuntime> {
    const existing = this.runtimes.get(entryId);
    if (existing) {
      return existing;
    }

    const entry = await this.entries.getEntry(entryId);
    if (!entry) {
      throw notFoundError(`Config entry ${entryId} not found`);
    }

    const runtime = this.buildRuntime(entry);
    this.runtimes.set(entryId, runtime);

    const reauthDue = runtime.tokenManager.checkReauth();
    const car = resolveSelectedCar(runtime.options);
    const startPolling = options.startPolling ?? true;
    try {
      if (car) {
        const { disabled } = await runtime.registry.syncSelectedVehicle(car);
        runtime.selectedVehicleDisabled = disabled;
        runtime.coordinator = this.buildCoordinator(runtime, car);
      } else {
        runtime.log.warn('no vehicle selected; polling disabled');
      }

      if (startPolling) {
        this.startMaintenance(runtime);
        if (runtime.coordinator && !reauthDue) {
          await runtime.coordinator.start();
        }
      }
    } catch (error) {
      this.unloadEntry(entryId);
      throw error;
    }

    runtime.log.info(
      { vehicleId: car?.carId ?? null, polling: startPolling && !reauthDue },
      'config entry set up',
    );
    return runtime;
  }

  unloadEntry(entryId: string): boolean {
    const runtime = this.runtimes.get(entryId);
    if (!runtime) {
      return false;
    }

    runtime.coordinator?.stop();
    if (runtime.maintenanceTimer) {
      clearInterval(runtime.maintenanceTimer);
      runtime.maintenanceTimer = null;
    }

    this.runtimes.delete(entryId);
    runtime.log.info('config entry unloaded');
    return true;
  }

  async reloadEntry(entryId: string, options: SetupOptions = {}): Promise<EntryRuntime> {
    this.unloadEntry(entryId);
    return this.setupEntry(entryId, options);
  }

  /**
   * Stops the runtime, revokes the access token and deletes the entry together
   * with its vehicle descriptors.
   */
  async removeEntry(entryId: string): Promise<void> {
    const entry = await this.entries.getEntry(entryId);
    if (!entry) {
      throw notFoundError(`Config entry ${entryId} not found`);
    }

    const credentials =
      this.runtimes.get(entryId)?.tokenManager.getCredentials() ?? entry.credentials;
    this.unloadEntry(entryId);

    try {
      await this.client.revokeToken(
        { clientId: credentials.clientId, clientSecret: credentials.clientSecret },
        credentials.accessToken,
      );
    } catch (error) {
      this.log.warn({ entryId, err: error }, 'access token revocation failed');
    }

    await this.vehicles.deleteVehicles(entryId);
    await this.entries.deleteEntry(entryId);
    this.notifications.removeEntry(entryId);
    this.log.info({ entryId }, 'config entry removed');
  }

  shutdown(): void {
    Array.from(this.runtimes.keys()).forEach((entryId) => this.unloadEntry(entryId));
  }

  /**
   * Finishes an authorization flow: creates a new entry, or hands fresh
   * credentials to the entry being re-authenticated.
   */
  readonly completeFlow = async (completion: FlowCompletion): Promise<string> => {
    if (!completion.reauthEntryId) {
      const entry = await this.entries.createEntry({
        title: completion.title,
        credentials: completion.credentials,
        options: completion.options,
      });
      await this.setupEntry(entry.entryId);
      return entry.entryId;
    }

    const entryId = completion.reauthEntryId;
    const runtime = this.runtimes.get(entryId);
    this.notifications.clearReauth(entryId);

    if (!runtime) {
      await this.entries.saveCredentials(entryId, completion.credentials);
      await this.entries.saveOptions(entryId, completion.options);
      await this.setupEntry(entryId);
      return entryId;
    }

    runtime.tokenManager.reset();
    await runtime.tokenManager.adopt(completion.credentials);
    await this.entries.saveOptions(entryId, completion.options);

    const sameVehicle =
      runtime.coordinator !== null &&
      runtime.coordinator.vehicleId === completion.options.selectedCarId;
    if (sameVehicle && runtime.coordinator) {
      runtime.options = completion.options;
      await runtime.coordinator.start();
      runtime.log.info('re-authenticated; polling resumed');
      return entryId;
    }

    await this.reloadEntry(entryId);
    return entryId;
  };

  get loadedEntryCount(): number {
    return this.runtimes.size;
  }

  getRuntime(entryId: string): EntryRuntime {
    const runtime = this.runtimes.get(entryId);
    if (!runtime) {
      throw notFoundError(`Config entry ${entryId} is not loaded`);
    }

    return runtime;
  }

  async listEntries(): Promise<EntrySummary[]> {
    const entries = await this.entries.listEntries();
    return Promise.all(
      entries.map(async (entry) => {
        const runtime = this.runtimes.get(entry.entryId);
        const options = runtime?.options ?? entry.options;
        const car = resolveSelectedCar(options);
        const coordinator = runtime?.coordinator ?? null;
        return {
          entryId: entry.entryId,
          title: entry.title,
          tokenState: runtime?.tokenManager.state ?? 'unauthenticated',
          selectedVehicleId: options.selectedCarId ?? car?.carId ?? null,
          vehicleName: car ? describeCar(car).nickname : null,
          selectedVehicleDisabled: runtime?.selectedVehicleDisabled ?? false,
          polling: coordinator !== null && coordinator.isRunning && !coordinator.isHalted,
          vehicles: await this.vehicles.listVehicles(entry.entryId),
        };
      }),
    );
  }

  getEntities(entryId: string): EntryEntities {
    const runtime = this.getRuntime(entryId);
    const { coordinator } = runtime;
    const car = resolveSelectedCar(runtime.options);

    if (!coordinator || !car) {
      return { entryId, vehicleId: null, sensors: [], buttons: [] };
    }

    const context = {
      vehicleId: car.carId,
      vehicleName: describeCar(car).nickname,
      available: this.isAvailable(runtime),
    };

    return {
      entryId,
      vehicleId: car.carId,
      sensors: buildEntityStates({
        ...context,
        snapshot: runtime.snapshot,
        jobs: coordinator.getJobStatuses(),
      }),
      buttons: buildButtonStates(context),
    };
  }

  getJobStatuses(entryId: string): JobStatus[] {
    return this.getRuntime(entryId).coordinator?.getJobStatuses() ?? [];
  }

  // The Force Refresh button.
  async refreshEntry(entryId: string): Promise<JobStatus[]> {
    const { coordinator } = this.getRuntime(entryId);
    return coordinator ? coordinator.refreshAll() : [];
  }

  async resyncEntry(entryId: string): Promise<ResyncResult> {
    const runtime = this.getRuntime(entryId);
    const { result, options } = await runtime.registry.resync(runtime.options);
    runtime.options = options;
    runtime.selectedVehicleDisabled = result.selectedVehicleDisabled;
    return result;
  }

  // Re-discover: validate and switch the selected vehicle, then restart polling.
  async selectVehicle(entryId: string, carId: string): Promise<EntryRuntime> {
    const runtime = this.getRuntime(entryId);
    await runtime.registry.selectVehicle(runtime.options, carId);
    return this.reloadEntry(entryId);
  }

  private isAvailable(runtime: EntryRuntime): boolean {
    return !runtime.selectedVehicleDisabled && runtime.tokenManager.state !== 'reauth_required';
  }

  private buildRuntime(entry: ConfigEntry): EntryRuntime {
    const log = this.log.child({ entryId: entry.entryId });
    const tokenManager = new TokenManager({
      entryId: entry.entryId,
      client: this.client,
      store: this.entries,
      credentials: entry.credentials,
      refreshMarginMs: this.config.tokenRefreshMarginMs,
      onReauthRequired: (entryId, reason) => {
        this.notifications.notifyReauthRequired(entryId, reason);
      },
      logger: log,
    });

    return {
      entryId: entry.entryId,
      title: entry.title,
      options: entry.options,
      tokenManager,
      snapshot: new SnapshotStore(),
      registry: new VehicleRegistry({
        entryId: entry.entryId,
        client: this.client,
        tokenManager,
        vehicles: this.vehicles,
        entries: this.entries,
        logger: log,
      }),
      coordinator: null,
      selectedVehicleDisabled: false,
      maintenanceTimer: null,
      log,
    };
  }

  private buildCoordinator(runtime: EntryRuntime, car: BluelinkCar): PollingCoordinator {
    return new PollingCoordinator({
      entryId: runtime.entryId,
      vehicleId: car.carId,
      jobs: buildPollingJobs(this.config.intervals, {
        evCapable: isEvCapableCarType(car.carType),
      }),
      client: this.client,
      tokenManager: runtime.tokenManager,
      snapshot: runtime.snapshot,
      logger: runtime.log,
    });
  }

  private startMaintenance(runtime: EntryRuntime): void {
    runtime.maintenanceTimer = setInterval(() => {
      runtime.tokenManager.maintain().catch((error: unknown) => {
        runtime.log.warn({ err: error }, 'token maintenance failed');
      });
    }, TOKEN_MAINTENANCE_INTERVAL_MS);
  }
}
