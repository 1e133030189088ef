import { describe, it, expect } from "vitest";
import {
  AppError,
  DatasetFormatError,
  ExternalServiceError,
  JudgeFormatError,
  MissingCredentialsError,
  ValidationError,
  errorMessage,
} from "./errors.js";

describe("AppError", () => {
  it("creates error with default values", () => {
    const error = new AppError("Something went wrong");

    expect(error.message).toBe("Something went wrong");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.isOperational).toBe(true);
    expect(error.context).toBeUndefined();
    expect(error.name).toBe("AppError");
    expect(error).toBeInstanceOf(Error);
  });

  it("keeps the cause", () => {
    const cause = new Error("Original error");
    const error = new AppError("Wrapped error", { cause });

    expect(error.cause).toBe(cause);
  });

  it("serializes context only when present", () => {
    expect(new AppError("a", { code: "X" }).toJSON()).toEqual({
      name: "AppError",
      message: "a",
      code: "X",
      isOperational: true,
    });
    expect(new AppError("b", { context: { index: 2 } }).toJSON()).toEqual({
      name: "AppError",
      message: "b",
      code: "INTERNAL_ERROR",
      isOperational: true,
      context: { index: 2 },
    });
  });
});

describe("subclasses", () => {
  it("DatasetFormatError carries its code and default message", () => {
    const error = new DatasetFormatError();

    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe("DatasetFormatError");
    expect(error.code).toBe("DATASET_FORMAT_ERROR");
    expect(error.message).toBe(
      "Unsupported dataset format; expected list or {'dataset': [...]}",
    );
  });

  it("MissingCredentialsError and ValidationError use their codes", () => {
    expect(new MissingCredentialsError().code).toBe("MISSING_CREDENTIALS");
    expect(new ValidationError().code).toBe("VALIDATION_ERROR");
  });

  it("ExternalServiceError includes statusCode in JSON", () => {
    const error = new ExternalServiceError("PubMed failed", {
      statusCode: 503,
    });

    expect(error.statusCode).toBe(503);
    expect(error.toJSON()).toEqual({
      name: "ExternalServiceError",
      message: "PubMed failed",
      code: "EXTERNAL_SERVICE_ERROR",
      isOperational: true,
      statusCode: 503,
    });
  });

  it("JudgeFormatError records the raw reply", () => {
    const error = new JudgeFormatError("no number here", {
      context: { index: 4 },
    });

    expect(error.raw).toBe("no number here");
    expect(error.context).toEqual({ index: 4, raw: "no number here" });
  });
});

describe("errorMessage", () => {
  it("returns the message of an Error and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
