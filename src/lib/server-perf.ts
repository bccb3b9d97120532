import { isPerfLoggingEnabled } from "@/lib/recipe-finder-config";

type ServerPerfLog = {
  phase: string;
  route: string;
  startedAt: number;
  success: boolean;
  meta?: Record<string, unknown>;
};

export const logServerPerf = ({ phase, route, startedAt, success, meta }: ServerPerfLog) => {
  if (!isPerfLoggingEnabled()) {
    return;
  }

  const payload = {
    phase,
    route,
    duration_ms: Math.max(0, Date.now() - startedAt),
    success,
    ...(meta ? { meta } : {}),
  };

  console.info("[server-perf]", JSON.stringify(payload));
};

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : "unknown_error";
