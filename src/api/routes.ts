/**
 * API routes for the meter fleet.
 *
 * - /api/health - Health check
 * - /api/meters - Latest readings of every meter
 * - /api/meters/:name - Latest reading of one meter
 * - /api/meters/:name/battery/mode - Battery group control (grid meters)
 */
import { Hono } from "hono";
import { z } from "zod";

import { BatteryModeSchema, formatDeviceError } from "../device/index.js";
import type { Fleet } from "../fleet/index.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

const BatteryModeRequestSchema = z.object({
  mode: BatteryModeSchema,
});

export function createRoutes(fleet: Fleet): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      meters: fleet.names().length,
    });
  });

  // ===========================================================================
  // Readings
  // ===========================================================================

  routes.get("/api/meters", (c) => {
    const requestId = c.get("requestId");
    return c.json({ meters: fleet.readings(), requestId });
  });

  /**
   * One meter. 503 while its telemetry is stale.
   */
  routes.get("/api/meters/:name", (c) => {
    const requestId = c.get("requestId");
    const name = c.req.param("name");
    const reading = fleet.reading(name);

    if (reading === undefined) {
      return c.json({ error: `Unknown meter '${name}'`, requestId }, 404);
    }

    if (reading.reading === null) {
      log.warn({ requestId, meter: name, error: reading.error }, "Meter reading unavailable");
      return c.json({ ...reading, requestId }, 503);
    }

    return c.json({ ...reading, requestId });
  });

  // ===========================================================================
  // Battery Control
  // ===========================================================================

  routes.put("/api/meters/:name/battery/mode", async (c) => {
    const requestId = c.get("requestId");
    const name = c.req.param("name");

    const body: unknown = await c.req.json().catch(() => null);
    const parsed = BatteryModeRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        { success: false, error: "Body must be { mode: zero | to_full | standby }", requestId },
        400,
      );
    }

    const device = fleet.get(name);
    if (device === undefined) {
      return c.json({ success: false, error: `Unknown meter '${name}'`, requestId }, 404);
    }

    if (device.battery === undefined) {
      return c.json(
        { success: false, error: `Meter '${name}' has no battery control`, requestId },
        409,
      );
    }

    const { mode } = parsed.data;
    log.info({ requestId, meter: name, mode }, "PUT battery mode");

    const result = await device.battery.setMode(mode);
    if (result.isErr()) {
      const error = formatDeviceError(result.error);
      log.error({ requestId, meter: name, error }, "Failed to set battery mode");
      return c.json({ success: false, error, requestId }, 502);
    }

    return c.json({
      success: true,
      mode: result.value.requestedMode,
      path: result.value.path,
      requestId,
    });
  });

  return routes;
}
