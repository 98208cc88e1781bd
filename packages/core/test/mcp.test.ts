import { describe, it, expect } from "vitest";
import { Ok, Err } from "../src/result.js";
import { errorResponse, successResponse, resultToResponse, guardTool } from "../src/mcp.js";

describe("tool responses", () => {
  describe("errorResponse", () => {
    it("prefixes the message and flags the error", () => {
      expect(errorResponse("Symbol not found")).toEqual({
        content: [{ type: "text", text: "Error: Symbol not found" }],
        structuredContent: { success: false, error: "Symbol not found" },
        isError: true,
      });
    });
  });

  describe("successResponse", () => {
    it("merges data into structured content", () => {
      expect(successResponse("Found 2 cycles", { count: 2 })).toEqual({
        content: [{ type: "text", text: "Found 2 cycles" }],
        structuredContent: { success: true, count: 2 },
      });
    });

    it("works without data", () => {
      expect(successResponse("done").structuredContent).toEqual({ success: true });
    });
  });

  describe("resultToResponse", () => {
    it("formats a success", () => {
      const response = resultToResponse(Ok(42), (value) => successResponse(`Depth ${value}`, { value }));
      expect(response).toEqual({
        content: [{ type: "text", text: "Depth 42" }],
        structuredContent: { success: true, value: 42 },
      });
    });

    it("accepts a string error", () => {
      const response = resultToResponse(Err("failed"), () => successResponse("unused"));
      expect(response).toEqual(errorResponse("failed"));
    });

    it("takes the message of an Error", () => {
      const response = resultToResponse(Err(new Error("Unknown symbol: x")), () => successResponse("unused"));
      expect(response.structuredContent).toEqual({ success: false, error: "Unknown symbol: x" });
    });
  });

  describe("guardTool", () => {
    it("returns the body's response", async () => {
      expect(await guardTool(async () => successResponse("ok"))).toEqual(successResponse("ok"));
    });

    it("turns a thrown error into an error response", async () => {
      const response = await guardTool(async () => {
        throw new Error("database is locked");
      });
      expect(response).toEqual(errorResponse("database is locked"));
    });

    it("turns a thrown string into an error response", async () => {
      const response = await guardTool(async () => {
        throw "stdin closed";
      });
      expect(response).toEqual(errorResponse("stdin closed"));
    });
  });
});
