import { buildPath, listResult, voidResult } from "@cloudkit/shared/api";
import { z } from "zod";
import type { ApiResource, CallOptions } from "../http/resource";
import { parseInput } from "../http/resource";

const WorkerRouteSchema = z
  .object({
    id: z.string(),
    pattern: z.string(),
    script: z.string().nullish(),
  })
  .passthrough();

const WorkerRouteInputSchema = z.object({
  pattern: z.string().trim().min(1),
  /** Omit to disable Workers on the pattern. */
  script: z.string().min(1).optional(),
});

export type WorkerRoute = z.infer<typeof WorkerRouteSchema>;
export type WorkerRouteInput = z.input<typeof WorkerRouteInputSchema>;

export interface WorkersClient {
  listRoutes: (zoneId: string, options?: CallOptions) => Promise<WorkerRoute[]>;
  getRoute: (
    zoneId: string,
    routeId: string,
    options?: CallOptions,
  ) => Promise<WorkerRoute>;
  createRoute: (
    zoneId: string,
    input: WorkerRouteInput,
    options?: CallOptions,
  ) => Promise<WorkerRoute>;
  updateRoute: (
    zoneId: string,
    routeId: string,
    input: WorkerRouteInput,
    options?: CallOptions,
  ) => Promise<WorkerRoute>;
  deleteRoute: (
    zoneId: string,
    routeId: string,
    options?: CallOptions,
  ) => Promise<void>;
}

export interface WorkersClientOptions {
  resource: ApiResource;
}

const routesPath = (zoneId: string) =>
  buildPath("zones/{zoneId}/workers/routes", { zoneId });

const routePath = (zoneId: string, routeId: string) =>
  buildPath("zones/{zoneId}/workers/routes/{routeId}", { zoneId, routeId });

export function createWorkersClient(
  options: WorkersClientOptions,
): WorkersClient {
  const { resource } = options;

  return {
    listRoutes: (zoneId, callOptions) =>
      resource.get(routesPath(zoneId), listResult(WorkerRouteSchema), callOptions),

    getRoute: (zoneId, routeId, callOptions) =>
      resource.get(routePath(zoneId, routeId), WorkerRouteSchema, callOptions),

    createRoute: (zoneId, input, callOptions) =>
      resource.post(
        routesPath(zoneId),
        parseInput(WorkerRouteInputSchema, input, "input"),
        WorkerRouteSchema,
        callOptions,
      ),

    updateRoute: (zoneId, routeId, input, callOptions) =>
      resource.put(
        routePath(zoneId, routeId),
        parseInput(WorkerRouteInputSchema, input, "input"),
        WorkerRouteSchema,
        callOptions,
      ),

    deleteRoute: (zoneId, routeId, callOptions) =>
      resource.del(routePath(zoneId, routeId), voidResult, callOptions),
  };
}
