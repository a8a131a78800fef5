import { Response } from "express";
import { STATUS_BY_KIND, sendError } from "./errors";
import {
  ConstraintViolationError,
  NotFoundError,
  PreconditionFailedError,
  ValidationError,
} from "../domain/errors";

describe("sendError", () => {
  const createResponse = () => {
    const res = {
      status: jest.fn(),
      type: jest.fn(),
      send: jest.fn(),
    };
    res.status.mockReturnValue(res);
    res.type.mockReturnValue(res);
    res.send.mockReturnValue(res);
    return res;
  };

  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it.each([
    [new ValidationError([{ field: "age", message: "must be at least 13" }]), 400, "age: must be at least 13"],
    [new NotFoundError("Student not found"), 404, "Student not found"],
    [new PreconditionFailedError("Old email does not match"), 412, "Old email does not match"],
    [new ConstraintViolationError("email", "Email already in use: a@x.com"), 409, "Email already in use: a@x.com"],
  ])("maps %p to its status with a plain-text message", (error, status, message) => {
    const res = createResponse();

    sendError(res as unknown as Response, error, "Failed to do it");

    expect(res.status).toHaveBeenCalledWith(status);
    expect(res.type).toHaveBeenCalledWith("text/plain");
    expect(res.send).toHaveBeenCalledWith(message);
    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it("logs unexpected errors and hides their details", () => {
    const res = createResponse();
    const failure = new Error("disk on fire");

    sendError(res as unknown as Response, failure, "Failed to fetch students");

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.send).toHaveBeenCalledWith("Failed to fetch students");
    expect(consoleSpy).toHaveBeenCalledWith("Failed to fetch students:", failure);
  });

  it("covers every error kind", () => {
    expect(Object.keys(STATUS_BY_KIND).sort()).toEqual([
      "constraint_violation",
      "not_found",
      "precondition_failed",
      "validation",
    ]);
  });
});
