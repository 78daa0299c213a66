/**
 * Crash matching route: POST /crashes/match
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import request from "supertest";
import express from "express";
import crashesRoutes from "../routes/crashes.routes.js";

const app = express();
app.use(express.json());
app.use("/api/v1/crashes", crashesRoutes);

const segments = [
  { CORR_ID: "MT-1", CORR_MP: "0+0.0", CORR_ENDMP: "10+0.0", DEPT_ID: "N-1" },
  { CORR_ID: "MT-1", CORR_MP: "10+0.0", CORR_ENDMP: "20+0.0", DEPT_ID: "N-1" },
];

describe("POST /api/v1/crashes/match", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns per-segment counts and unmatched reasons", async () => {
    const res = await request(app)
      .post("/api/v1/crashes/match")
      .send({
        segments,
        crashes: [
          { CORRIDOR: "MT-1", REF_POINT: "5+0.0" },
          { CORRIDOR: "MT-1", REF_POINT: "15+0.0" },
          { CORRIDOR: "MT-1", REF_POINT: "16+0.0" },
          { CORRIDOR: "MT-1", REF_POINT: "25+0.0" },
          { CORRIDOR: "XX", REF_POINT: "1+0.0" },
          { CORRIDOR: "MT-1", REF_POINT: "bad" },
        ],
      })
      .expect(200);

    expect(res.body.success).toBe(true);
    expect(res.body.data.matched).toBe(3);
    expect(res.body.data.unmatched).toBe(3);
    expect(res.body.data.unmatchedByReason).toEqual({
      "unknown-corridor": 1,
      "unparseable-milepost": 1,
      "outside-intervals": 1,
    });
    expect(res.body.data.segments).toEqual([
      {
        segmentKey: "MT-1_0+0.0_10+0.0_N-1",
        corridorId: "MT-1",
        startMilepost: "0+0.0",
        endMilepost: "10+0.0",
        departmentId: "N-1",
        crashCount: 1,
      },
      {
        segmentKey: "MT-1_10+0.0_20+0.0_N-1",
        corridorId: "MT-1",
        startMilepost: "10+0.0",
        endMilepost: "20+0.0",
        departmentId: "N-1",
        crashCount: 2,
      },
    ]);
  });

  it("returns 400 when segments are missing", async () => {
    const res = await request(app).post("/api/v1/crashes/match").send({ crashes: [] }).expect(400);
    expect(res.body).toEqual({
      success: false,
      error: "segments must be an array of segment records",
      code: "INVALID_SEGMENTS",
    });
  });

  it("returns 400 when crashes are not records", async () => {
    const res = await request(app).post("/api/v1/crashes/match").send({ segments, crashes: ["MT-1"] }).expect(400);
    expect(res.body.code).toBe("INVALID_CRASHES");
  });
});
