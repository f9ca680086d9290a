import { describe, it, expect } from "vitest";
import { errorResponse, resultToStructuredResponse } from "../src/mcp.js";
import { Ok, Err } from "../src/result.js";

describe("MCP utilities", () => {
  describe("errorResponse", () => {
    it("prefixes the text and marks the payload as failed", () => {
      expect(errorResponse("file not indexed")).toEqual({
        content: [{ type: "text", text: "Error: file not indexed" }],
        structuredContent: { success: false, error: "file not indexed" },
      });
    });
  });

  describe("resultToStructuredResponse", () => {
    it("formats an Ok result with text and data", () => {
      const response = resultToStructuredResponse(Ok(3), (n) => ({
        text: `${n} symbols`,
        data: { count: n },
      }));
      expect(response).toEqual({
        content: [{ type: "text", text: "3 symbols" }],
        structuredContent: { success: true, count: 3 },
      });
    });

    it("converts an Err string into an error response", () => {
      const response = resultToStructuredResponse(Err("session closed"), () => ({
        text: "unused",
        data: {},
      }));
      expect(response.structuredContent).toEqual({ success: false, error: "session closed" });
    });

    it("uses the message of an Error", () => {
      const response = resultToStructuredResponse(Err(new Error("bad input")), () => ({
        text: "unused",
        data: {},
      }));
      expect(response.content[0].text).toBe("Error: bad input");
    });
  });
});
