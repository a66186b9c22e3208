import { describe, it, expect } from "vitest";
import {
  AuthenticationError,
  ConfigError,
  ConnectivityError,
  errorMessage,
  isAlreadyExistsError,
  isFatalError,
  RemoteStoreError,
  TargetNotFoundError,
  ValidationFailedError,
} from "./errors.js";

describe("errors", () => {
  it("treats setup failures as fatal", () => {
    expect(isFatalError(new ConnectivityError("down"))).toBe(true);
    expect(isFatalError(new AuthenticationError("bad key"))).toBe(true);
    expect(isFatalError(new TargetNotFoundError("no folder", "folder-9"))).toBe(true);
    expect(isFatalError(new ValidationFailedError("invalid"))).toBe(true);
    expect(isFatalError(new ConfigError("missing option"))).toBe(true);
  });

  it("does not treat per-node store failures as fatal", () => {
    expect(isFatalError(new RemoteStoreError("server busy", 503))).toBe(false);
    expect(isFatalError(new Error("boom"))).toBe(false);
  });

  it("recognizes name conflicts by their message", () => {
    expect(isAlreadyExistsError(new RemoteStoreError("A folder with that name Already Exists here.", 400))).toBe(true);
    expect(isAlreadyExistsError(new RemoteStoreError("Invalid folder id", 400))).toBe(false);
    expect(isAlreadyExistsError("already exists")).toBe(false);
  });

  it("extracts a message from anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
