import Fastify, { type FastifyInstance } from "fastify";
import { describe, it, expect, beforeAll, afterAll } from "vitest";

import {
  errorHandler,
  NotFoundError,
  ValidationError,
  NoDataError,
  DatabaseError,
} from "../../../../src/server/plugins/error-handler.js";

import type { ApiError } from "../../../../src/types/api.js";

describe("server/plugins/error-handler", () => {
  // ============================================================================
  // Custom Error Classes Tests
  // ============================================================================

  describe("error classes", () => {
    it.each([
      [new NotFoundError("missing"), "NotFoundError", "NOT_FOUND", 404],
      [new ValidationError("bad"), "ValidationError", "VALIDATION_ERROR", 400],
      [new NoDataError("empty"), "NoDataError", "NO_DATA", 404],
      [new DatabaseError("down"), "DatabaseError", "DATABASE_ERROR", 503],
    ])("should create %s with its code and status", (error, name, code, status) => {
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
      expect(error.statusCode).toBe(status);
    });

    it("should keep validation details", () => {
      const details = { periodFrom: "2015-03", periodTo: "2015-01" };
      expect(new ValidationError("bad range", details).details).toEqual(
        details
      );
    });
  });

  // ============================================================================
  // Error Handler Plugin Tests
  // ============================================================================

  describe("errorHandler plugin", () => {
    let app: FastifyInstance;

    beforeAll(async () => {
      app = Fastify({ logger: false });
      await app.register(errorHandler);

      app.get("/not-found", async () => {
        throw new NotFoundError("Period not found");
      });
      app.get("/validation-error", async () => {
        throw new ValidationError("Invalid range", { field: "periodFrom" });
      });
      app.get("/validation-error-no-details", async () => {
        throw new ValidationError("Invalid range");
      });
      app.get("/no-data", async () => {
        throw new NoDataError("No variance rows");
      });
      app.get("/database-error", async () => {
        throw new DatabaseError("Warehouse unavailable");
      });
      app.get("/generic-error", async () => {
        throw new Error("Something went wrong");
      });
      app.get("/fastify-404", async () => {
        throw Object.assign(new Error("Not found"), { statusCode: 404 });
      });
      app.get(
        "/schema-validation",
        {
          schema: {
            querystring: {
              type: "object",
              properties: { limit: { type: "integer" } },
            },
          },
        },
        () => ({ ok: true })
      );

      await app.ready();
    });

    afterAll(async () => {
      await app.close();
    });

    it.each([
      ["/not-found", 404, "NOT_FOUND", "Period not found"],
      ["/no-data", 404, "NO_DATA", "No variance rows"],
      ["/database-error", 503, "DATABASE_ERROR", "Warehouse unavailable"],
      ["/generic-error", 500, "INTERNAL_ERROR", "An unexpected error occurred"],
    ])("should map %s to %i", async (url, status, error, message) => {
      const response = await app.inject({ method: "GET", url });

      expect(response.statusCode).toBe(status);
      const body = response.json<ApiError>();
      expect(body.error).toBe(error);
      expect(body.message).toBe(message);
      expect(body.requestId).toBeDefined();
    });

    it("should include ValidationError details when present", async () => {
      const withDetails = await app.inject({
        method: "GET",
        url: "/validation-error",
      });
      const withoutDetails = await app.inject({
        method: "GET",
        url: "/validation-error-no-details",
      });

      expect(withDetails.statusCode).toBe(400);
      expect(withDetails.json<ApiError>().details).toEqual({
        field: "periodFrom",
      });
      expect(withoutDetails.json<ApiError>().details).toBeUndefined();
    });

    it("should handle errors carrying a 404 status", async () => {
      const response = await app.inject({ method: "GET", url: "/fastify-404" });

      expect(response.statusCode).toBe(404);
      expect(response.json<ApiError>().error).toBe("NOT_FOUND");
    });

    it("should handle schema validation errors", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/schema-validation?limit=many",
      });

      expect(response.statusCode).toBe(400);
      const body = response.json<ApiError>();
      expect(body.error).toBe("VALIDATION_ERROR");
      expect(body.message).toBe("Invalid request parameters");
      expect(body.details?.validation).toBeDefined();
    });

    it("should handle unknown routes with 404", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/unknown-route",
      });

      expect(response.statusCode).toBe(404);
      expect(response.json<ApiError>().message).toBe(
        "Route POST /unknown-route not found"
      );
    });
  });
});
