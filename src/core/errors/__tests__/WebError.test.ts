import { WebError, WebErrorCode } from "@core/errors";

describe("WebError", () => {
  it("should create a port in use error", () => {
    const error = WebError.portInUse(8080);

    expect(error.code).toBe(WebErrorCode.PORT_IN_USE);
    expect(error.message).toBe("Port 8080 is already in use");
    expect(error.statusCode).toBe(500);
    expect(error.recoverable).toBe(false);
  });

  it("should create a server start error with the original message", () => {
    const error = WebError.serverStartFailed(8080, new Error("EACCES"));

    expect(error.message).toBe(
      "Failed to start web server on port 8080: EACCES",
    );
    expect(error.context).toEqual({ port: 8080, originalError: "EACCES" });
  });

  it("should create a recoverable render error", () => {
    const error = WebError.renderFailed(new Error("bad snapshot"));

    expect(error.code).toBe(WebErrorCode.RENDER_FAILED);
    expect(error.message).toBe("Error rendering web page: bad snapshot");
    expect(error.recoverable).toBe(true);
    expect(error.statusCode).toBe(500);
  });

  it("should create a not running error", () => {
    const error = WebError.serverNotRunning();

    expect(error.code).toBe(WebErrorCode.SERVER_NOT_RUNNING);
    expect(error.statusCode).toBeUndefined();
  });
});
