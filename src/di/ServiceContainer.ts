import {
  IDeviceConnector,
  IFixStore,
  ILocationRepository,
  IWebInterfaceService,
} from "@core/interfaces";
import { AppConfig } from "@core/types";
import { FixStore } from "@services/fixStore/FixStore";
import { DeviceConnector } from "@services/stream/DeviceConnector";
import { StreamReader } from "@services/stream/StreamReader";
import { OutboundQueue } from "@services/logging/OutboundQueue";
import { LocationSampler } from "@services/logging/LocationSampler";
import { QueueFlusher } from "@services/logging/QueueFlusher";
import { LocationRepository } from "@services/storage/LocationRepository";
import { StatusPageRenderer } from "@services/status/StatusPageRenderer";
import { StatusController } from "@web/controllers/StatusController";
import { StatusWebService } from "@web/StatusWebService";

/**
 * Service Container (Dependency Injection Container)
 *
 * Creates each service on first use and hands out the same instance
 * afterwards, so the stream reader, sampler and web layer share one fix
 * store and one outbound queue. Test setters replace the I/O-bound
 * services before anything depending on them is created.
 */
export class ServiceContainer {
  private services: {
    fixStore?: IFixStore;
    connector?: IDeviceConnector;
    streamReader?: StreamReader;
    queue?: OutboundQueue;
    sampler?: LocationSampler;
    repository?: ILocationRepository;
    flusher?: QueueFlusher;
    web?: IWebInterfaceService;
  } = {};

  constructor(private readonly config: AppConfig) {}

  getConfig(): AppConfig {
    return this.config;
  }

  getFixStore(): IFixStore {
    if (!this.services.fixStore) {
      this.services.fixStore = new FixStore();
    }
    return this.services.fixStore;
  }

  getDeviceConnector(): IDeviceConnector {
    if (!this.services.connector) {
      this.services.connector = new DeviceConnector(this.config.device);
    }
    return this.services.connector;
  }

  getStreamReader(): StreamReader {
    if (!this.services.streamReader) {
      this.services.streamReader = new StreamReader(
        this.getFixStore(),
        this.getDeviceConnector(),
        { reconnectDelayMs: this.config.device.reconnectDelayMs },
      );
    }
    return this.services.streamReader;
  }

  getOutboundQueue(): OutboundQueue {
    if (!this.services.queue) {
      this.services.queue = new OutboundQueue(
        this.config.logging.queueCapacity,
      );
    }
    return this.services.queue;
  }

  getLocationSampler(): LocationSampler {
    if (!this.services.sampler) {
      this.services.sampler = new LocationSampler(
        this.getFixStore(),
        this.getOutboundQueue(),
        {
          initialDelayMs: this.config.logging.sampleInitialDelayMs,
          intervalMs: this.config.logging.sampleIntervalMs,
        },
      );
    }
    return this.services.sampler;
  }

  getLocationRepository(): ILocationRepository {
    if (!this.services.repository) {
      this.services.repository = LocationRepository.fromConnectionString(
        this.config.database.connectionString,
      );
    }
    return this.services.repository;
  }

  getQueueFlusher(): QueueFlusher {
    if (!this.services.flusher) {
      this.services.flusher = new QueueFlusher(
        this.getOutboundQueue(),
        this.getLocationRepository(),
        this.config.logging.flushIntervalMs,
      );
    }
    return this.services.flusher;
  }

  getWebService(): IWebInterfaceService {
    if (!this.services.web) {
      const controller = new StatusController(
        {
          store: this.getFixStore(),
          stream: this.getStreamReader(),
          queue: this.getOutboundQueue(),
        },
        new StatusPageRenderer(this.config.web.mapsApiKey),
      );
      this.services.web = new StatusWebService(this.config.web, controller);
    }
    return this.services.web;
  }

  // Test helpers

  setDeviceConnector(connector: IDeviceConnector): void {
    this.services.connector = connector;
  }

  setLocationRepository(repository: ILocationRepository): void {
    this.services.repository = repository;
  }
}
