import { describe, test, expect } from "vitest";
import { z } from "zod";
import { ExportError, IngestError, fromZodError, handleError } from "@/lib/errors";
import { silentLogger } from "./helpers";

describe("error classes", () => {
  test("carry a code and their class name", () => {
    const error = new IngestError("missing file");
    expect(error.code).toBe("INGEST");
    expect(error.name).toBe("IngestError");
    expect(new ExportError("nope").code).toBe("EXPORT");
  });
});

describe("fromZodError", () => {
  test("lists each issue with its path", () => {
    const result = z.object({ TOP_N: z.number() }).safeParse({ TOP_N: "x" });
    if (result.success) throw new Error("expected failure");

    const error = fromZodError(result.error, "environment");

    expect(error.code).toBe("CONFIG");
    expect(error.message).toBe("Invalid environment:\n  TOP_N: Expected number, received string");
  });
});

describe("handleError", () => {
  test("report errors exit with status 1 and name the kind", () => {
    const logger = silentLogger();
    const cause = new Error("EACCES: permission denied");

    const status = handleError(new ExportError('Output directory "out" is not writable', { cause }), logger);

    expect(status).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      '❌ ExportError [EXPORT]: Output directory "out" is not writable'
    );
    expect(logger.error).toHaveBeenCalledWith("   caused by: EACCES: permission denied");
  });

  test("unexpected errors exit with status 1", () => {
    const logger = silentLogger();
    expect(handleError("boom", logger)).toBe(1);
    expect(logger.error).toHaveBeenCalledWith("❌ Unexpected error: An unexpected error occurred");
  });
});
