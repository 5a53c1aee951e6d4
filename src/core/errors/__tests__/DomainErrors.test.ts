import {
  QueueError,
  QueueErrorCode,
  SamplingError,
  StorageError,
  StorageErrorCode,
  StreamError,
  StreamErrorCode,
} from "@core/errors";

describe("StreamError", () => {
  it("should name the endpoint on connect failures", () => {
    const error = StreamError.connectFailed(
      "http://192.168.1.1:11010/",
      new Error("connect ECONNREFUSED"),
    );

    expect(error.code).toBe(StreamErrorCode.CONNECT_FAILED);
    expect(error.message).toBe(
      "Failed to connect to http://192.168.1.1:11010/: connect ECONNREFUSED",
    );
    expect(error.recoverable).toBe(true);
  });

  it("should describe a closed stream", () => {
    expect(StreamError.endOfStream().code).toBe(StreamErrorCode.END_OF_STREAM);
  });
});

describe("SamplingError", () => {
  it("should list the missing fragments", () => {
    const error = SamplingError.noDataToLog(["GGA"]);

    expect(error.message).toBe("No data to log (missing GGA)");
    expect(error.isNoData()).toBe(true);
  });

  it("should not report a bad timestamp as missing data", () => {
    expect(SamplingError.invalidDeviceTimestamp("x").isNoData()).toBe(false);
  });
});

describe("QueueError", () => {
  it("should keep the batch size of a failed write", () => {
    const error = QueueError.writeFailed(5, new Error("timeout"));

    expect(error.code).toBe(QueueErrorCode.WRITE_FAILED);
    expect(error.context).toEqual({ batchSize: 5, originalError: "timeout" });
  });
});

describe("StorageError", () => {
  it("should carry the index of the failing insert", () => {
    const error = StorageError.insertFailed(2, new Error("duplicate key"));

    expect(error.code).toBe(StorageErrorCode.INSERT_FAILED);
    expect(error.context).toEqual({ index: 2, originalError: "duplicate key" });
  });
});
