import { EventEmitter } from "events";
import { Pool } from "pg";
import {
  LocationRepository,
  toEWKT,
} from "@services/storage/LocationRepository";
import { StorageErrorCode } from "@core/errors";
import { makeRecord } from "@services/logging/__tests__/records";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const mockClient = {
  query: jest.fn(),
  release: jest.fn(),
};
const mockPool = Object.assign(new EventEmitter(), {
  connect: jest.fn(),
  query: jest.fn(),
  end: jest.fn(),
});

jest.mock("pg", () => ({
  Pool: jest.fn(() => mockPool),
}));

function statements(): string[] {
  return mockClient.query.mock.calls.map(([text]: [string]) =>
    text.startsWith("INSERT") ? "INSERT" : text,
  );
}

describe("LocationRepository", () => {
  let repository: LocationRepository;

  beforeEach(() => {
    jest.clearAllMocks();
    mockPool.removeAllListeners();
    mockPool.connect.mockResolvedValue(mockClient);
    mockClient.query.mockResolvedValue({ rows: [] });
    repository = new LocationRepository(new Pool());
  });

  describe("toEWKT", () => {
    it("should print lon lat alt with six decimals", () => {
      expect(
        toEWKT({ longitude: 11.516667, latitude: 48.1173, altitude: 545.4 }),
      ).toBe("SRID=4326;POINTZ(11.516667 48.117300 545.400000)");
    });

    it("should keep the sign of western and southern ordinates", () => {
      expect(toEWKT({ longitude: -0.5, latitude: -33.85, altitude: 0 })).toBe(
        "SRID=4326;POINTZ(-0.500000 -33.850000 0.000000)",
      );
    });
  });

  describe("insertBatch", () => {
    it("should insert every record inside one transaction", async () => {
      const records = [makeRecord(1), makeRecord(2)];

      const result = await repository.insertBatch(records);

      expect(result).toEqual({ success: true, data: 2 });
      expect(statements()).toEqual(["BEGIN", "INSERT", "INSERT", "COMMIT"]);
      expect(mockClient.query.mock.calls[1][1]).toEqual([
        records[0].loggedAt,
        records[0].deviceTimestamp,
        "SRID=4326;POINTZ(11.500000 48.100000 500.000000)",
        1,
        90,
      ]);
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it("should roll back and report the failing record", async () => {
      mockClient.query.mockImplementation(async (text: string, values?: unknown[]) => {
        if (text.startsWith("INSERT") && values?.[3] === 3) {
          throw new Error("duplicate key");
        }
        return { rows: [] };
      });
      const records = [1, 2, 3, 4, 5].map(makeRecord);

      const result = await repository.insertBatch(records);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(StorageErrorCode.INSERT_FAILED);
        expect(result.error.message).toBe(
          "Failed to insert record 2 to DB: duplicate key",
        );
      }
      expect(statements()).toEqual([
        "BEGIN",
        "INSERT",
        "INSERT",
        "INSERT",
        "ROLLBACK",
      ]);
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it("should roll back when the commit fails", async () => {
      mockClient.query.mockImplementation(async (text: string) => {
        if (text === "COMMIT") {
          throw new Error("serialization failure");
        }
        return { rows: [] };
      });

      const result = await repository.insertBatch([makeRecord(1)]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(StorageErrorCode.COMMIT_FAILED);
      }
      expect(statements()).toEqual(["BEGIN", "INSERT", "COMMIT", "ROLLBACK"]);
      expect(mockClient.release).toHaveBeenCalledWith(undefined);
    });

    it("should release a client whose rollback failed with that error", async () => {
      const rollbackError = new Error("connection terminated");
      mockClient.query.mockImplementation(async (text: string) => {
        if (text.startsWith("INSERT")) {
          throw new Error("duplicate key");
        }
        if (text === "ROLLBACK") {
          throw rollbackError;
        }
        return { rows: [] };
      });

      const result = await repository.insertBatch([makeRecord(1)]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(StorageErrorCode.INSERT_FAILED);
      }
      expect(mockClient.release).toHaveBeenCalledTimes(1);
      expect(mockClient.release).toHaveBeenCalledWith(rollbackError);
    });

    it("should fail without a connection", async () => {
      mockPool.connect.mockRejectedValue(new Error("ECONNREFUSED"));

      const result = await repository.insertBatch([makeRecord(1)]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(StorageErrorCode.TRANSACTION_FAILED);
        expect(result.error.message).toBe(
          "Failed to start db transaction: ECONNREFUSED",
        );
      }
      expect(mockClient.query).not.toHaveBeenCalled();
    });
  });

  describe("getLatest", () => {
    it("should map the newest row", async () => {
      const loggedAt = new Date("2024-06-15T10:30:05.000Z");
      const deviceTimestamp = new Date("2024-06-15T10:30:00.000Z");
      mockPool.query.mockResolvedValue({
        rows: [
          {
            logged_at: loggedAt,
            gps_timestamp: deviceTimestamp,
            longitude: 11.516667,
            latitude: 48.1173,
            altitude: 545.4,
          },
        ],
      });

      const result = await repository.getLatest();

      expect(result).toEqual({
        success: true,
        data: {
          loggedAt,
          deviceTimestamp,
          longitude: 11.516667,
          latitude: 48.1173,
          altitude: 545.4,
        },
      });
      expect(mockPool.query.mock.calls[0][0]).toContain(
        "ORDER BY logged_at DESC",
      );
    });

    it("should return null for an empty table", async () => {
      mockPool.query.mockResolvedValue({ rows: [] });

      expect(await repository.getLatest()).toEqual({ success: true, data: null });
    });

    it("should wrap query errors", async () => {
      mockPool.query.mockRejectedValue(new Error("relation does not exist"));

      const result = await repository.getLatest();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(StorageErrorCode.QUERY_FAILED);
      }
    });
  });

  it("should survive an error from an idle pooled client", () => {
    expect(mockPool.listenerCount("error")).toBe(1);
    expect(() =>
      mockPool.emit("error", new Error("terminating connection")),
    ).not.toThrow();
  });

  it("should end the pool on close", async () => {
    await repository.close();

    expect(mockPool.end).toHaveBeenCalledTimes(1);
  });
});
