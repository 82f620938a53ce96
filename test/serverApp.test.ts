/**
 * HTTP APPLICATION - TEST SUITE
 *
 * The express app listens on an ephemeral loopback port for the duration of
 * the suite; requests go through the global fetch.
 */

import { afterAll, beforeAll, describe, it, expect } from "vitest";
import type { Server } from "node:http";
import { createApp } from "../server/app";
import { validateSummaryForm } from "../services/formValidation.effect";

let server: Server;
let baseUrl = "";

beforeAll(async () => {
  server = await new Promise<Server>((resolve) => {
    const listening = createApp({ today: "2024-03-04" }).listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server did not bind a TCP port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

const post = async (path: string, body: string) => {
  const response = await fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
  const json: unknown = await response.json();
  return { status: response.status, json };
};

describe("express wiring", () => {
  it("should answer GET /health", async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok" });
  });

  it("should answer 400 for a malformed JSON body", async () => {
    expect(await post("/prompts", "{bad")).toEqual({
      status: 400,
      json: { detail: ["request body must be valid JSON"] },
    });
  });

  it("should answer 404 for an unknown form", async () => {
    expect(await post("/forms/nope/validate", "{}")).toEqual({
      status: 404,
      json: { detail: ['unknown form "nope"'] },
    });
  });

  it("should carry context errors in a 422 body", async () => {
    expect(await post("/prompts", JSON.stringify({ patient_id: " " }))).toEqual({
      status: 422,
      json: { detail: ["patient_id: must contain non-whitespace characters"] },
    });
  });

  it("should carry form issues in a 422 body", async () => {
    const response = await post("/forms/dcis-summary/validate", "{}");
    expect(response.status).toBe(422);
    expect(response.json).toEqual({ detail: validateSummaryForm({}).errors });
  });

  it("should apply the configured report date to assembled prompts", async () => {
    const response = await post("/prompts", JSON.stringify({ patient_id: "123" }));
    expect(response.status).toBe(200);
    expect(response.json).toMatchObject({ payload: { patient_id: "123", report_date: "2024-03-04" } });
  });
});
