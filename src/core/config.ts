import { z } from "zod";

export const DEFAULT_PROW_HOSTS = ["prow.ci.openshift.org"];

const HttpSchema = z.object({
  max_concurrent: z.number().int().positive().default(20),
  timeout_seconds: z.number().positive().default(30),
  connect_timeout_seconds: z.number().positive().default(10),
  max_retries: z.number().int().min(0).max(10).default(3),
  retry_min_delay_ms: z.number().int().nonnegative().default(100),
  retry_max_delay_ms: z.number().int().positive().default(5000),
});

export const AppConfigSchema = z
  .object({
    http: HttpSchema.default({}),
    prow_hosts: z.array(z.string().min(1)).default(DEFAULT_PROW_HOSTS),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    if (cfg.http.retry_min_delay_ms > cfg.http.retry_max_delay_ms) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["http", "retry_min_delay_ms"],
        message: "retry_min_delay_ms must not exceed retry_max_delay_ms",
      });
    }
  });

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type HttpConfig = AppConfig["http"];

export function defaultAppConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

// Overall request deadline and the shorter connect deadline, in milliseconds.
// The connect deadline never exceeds the overall one.
export function resolveHttpDeadlines(http: HttpConfig): {
  requestTimeoutMs: number;
  connectTimeoutMs: number;
} {
  const requestTimeoutMs = Math.round(http.timeout_seconds * 1000);
  const connectTimeoutMs = Math.min(
    Math.round(http.connect_timeout_seconds * 1000),
    requestTimeoutMs,
  );
  return { requestTimeoutMs, connectTimeoutMs };
}
