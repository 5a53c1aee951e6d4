import { LocationSampler } from "@services/logging/LocationSampler";
import { OutboundQueue } from "@services/logging/OutboundQueue";
import { FixStore } from "@services/fixStore/FixStore";
import { SamplingErrorCode } from "@core/errors";
import { SENTENCES, decode } from "@services/nmea/__tests__/fixtures";
import { makeRecord } from "./records";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

describe("LocationSampler", () => {
  let store: FixStore;
  let queue: OutboundQueue;
  let sampler: LocationSampler;

  beforeEach(() => {
    store = new FixStore();
    queue = new OutboundQueue();
    sampler = new LocationSampler(store, queue, {
      initialDelayMs: 10_000,
      intervalMs: 15 * 60_000,
    });
  });

  afterEach(() => {
    sampler.stop();
    jest.useRealTimers();
  });

  describe("sample", () => {
    it("should report missing fragments", () => {
      const result = sampler.sample();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(SamplingErrorCode.NO_DATA_TO_LOG);
        expect(result.error.message).toBe("No data to log (missing RMC, GGA)");
      }
      expect(queue.size()).toBe(0);
    });

    it("should skip a store holding only satellite geometry", () => {
      store.update(decode(SENTENCES.gsa));
      queue.enqueue(makeRecord(1));

      const result = sampler.sample();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(SamplingErrorCode.NO_DATA_TO_LOG);
        expect(result.error.message).toBe("No data to log (missing RMC, GGA)");
      }
      expect(queue.peek()).toEqual([makeRecord(1)]);
    });

    it("should need GGA for the altitude", () => {
      store.update(decode(SENTENCES.rmcSample));

      const result = sampler.sample();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("No data to log (missing GGA)");
      }
    });

    it("should queue a record built from RMC and GGA", () => {
      store.update(decode(SENTENCES.rmcSample));
      store.update(decode(SENTENCES.ggaSample));
      const now = new Date("2024-06-15T10:30:05.000Z");

      const result = sampler.sample(now);

      expect(result.success).toBe(true);
      if (!result.success) return;
      const record = result.data;
      expect(record.loggedAt.toISOString()).toBe("2024-06-15T10:30:05.000Z");
      expect(record.deviceTimestamp.toISOString()).toBe(
        "2024-06-15T10:30:00.000Z",
      );
      expect(record.latitude).toBeCloseTo(48.1173, 6);
      expect(record.longitude).toBeCloseTo(11.516667, 6);
      expect(record.altitude).toBe(545.4);
      expect(record.speed).toBe(0.5);
      expect(record.course).toBe(90);
      expect(Object.isFrozen(record)).toBe(true);
      expect(queue.peek()).toEqual([record]);
    });

    it("should reject an impossible RMC date", () => {
      store.update(decode(SENTENCES.rmcBadDate));
      store.update(decode(SENTENCES.gga));

      const result = sampler.sample();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(
          SamplingErrorCode.INVALID_DEVICE_TIMESTAMP,
        );
        expect(result.error.message).toBe(
          'Failed to parse RMC date time "31/02/94T12:35:19.000"',
        );
      }
      expect(queue.size()).toBe(0);
    });

    it("should reject a void fix without date", () => {
      store.update(decode(SENTENCES.rmcVoid));
      store.update(decode(SENTENCES.gga));

      const result = sampler.sample();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(
          'Failed to parse RMC date time "T10:30:00.000"',
        );
      }
    });
  });

  describe("schedule", () => {
    beforeEach(() => {
      jest.useFakeTimers();
      store.update(decode(SENTENCES.rmcSample));
      store.update(decode(SENTENCES.ggaSample));
    });

    it("should sample after the initial delay and then every interval", () => {
      sampler.start();
      expect(sampler.isRunning()).toBe(true);

      jest.advanceTimersByTime(9_999);
      expect(queue.size()).toBe(0);

      jest.advanceTimersByTime(1);
      expect(queue.size()).toBe(1);

      jest.advanceTimersByTime(15 * 60_000);
      expect(queue.size()).toBe(2);
    });

    it("should stop sampling after stop", () => {
      sampler.start();
      jest.advanceTimersByTime(10_000);
      sampler.stop();

      jest.advanceTimersByTime(60 * 60_000);

      expect(queue.size()).toBe(1);
      expect(sampler.isRunning()).toBe(false);
    });

    it("should keep running when a cycle has no data", () => {
      store.clear();
      sampler.start();

      jest.advanceTimersByTime(10_000 + 15 * 60_000);

      expect(queue.size()).toBe(0);
      expect(sampler.isRunning()).toBe(true);
    });
  });
});
