import { z } from "zod";
import {
  FlowError,
  IntegrationError,
  NotFoundError,
  ValidationError,
  describeError,
  httpStatusFor,
} from "../errors";
import { parseRequest } from "../../routes/helpers";

describe("errors", () => {
  it("should name errors after their class", () => {
    const error = new IntegrationError("crm down", { status: 503 });

    expect(error).toBeInstanceOf(FlowError);
    expect(error.name).toBe("IntegrationError");
    expect(error.context).toEqual({ status: 503 });
  });

  describe("describeError", () => {
    it("should merge the error context with the call context", () => {
      const report = describeError(new ValidationError("bad input", { field: "id" }), { node: "crm" });

      expect(report.status).toBe("error");
      expect(report.message).toBe("bad input");
      expect(report.error_type).toBe("ValidationError");
      expect(report.context).toMatchObject({ field: "id", node: "crm" });
      expect(typeof report.context.timestamp).toBe("string");
    });

    it("should handle thrown non-errors", () => {
      const report = describeError("plain string");

      expect(report.message).toBe("plain string");
      expect(report.error_type).toBe("string");
    });
  });

  describe("httpStatusFor", () => {
    it("should map the taxonomy to status codes", () => {
      expect(httpStatusFor(new ValidationError("x"))).toBe(400);
      expect(httpStatusFor(new NotFoundError("x"))).toBe(404);
      expect(httpStatusFor(new IntegrationError("x"))).toBe(500);
      expect(httpStatusFor(new Error("x"))).toBe(500);
    });
  });

  describe("parseRequest", () => {
    const schema = z.object({ interval: z.number().positive() });

    it("should return parsed data", () => {
      expect(parseRequest(schema, { interval: 5 })).toEqual({ interval: 5 });
    });

    it("should turn schema failures into a ValidationError", () => {
      expect(() => parseRequest(schema, { interval: -1 })).toThrow(ValidationError);
      expect(() => parseRequest(schema, {})).toThrow("interval: Required");
    });
  });
});
