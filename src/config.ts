import { z } from "zod";

const booleanFlag = z
    .string()
    .optional()
    .transform((value) => (value === undefined ? undefined : ["1", "true", "yes", "y"].includes(value.trim().toLowerCase())));

const envSchema = z.object({
    DATA_GO_KR_SERVICE_KEY: z
        .string()
        .optional()
        .transform((value) => value?.trim() || undefined),
    TYPHOON_API_URL: z
        .string()
        .url()
        .default("https://apis.data.go.kr/1360000/TyphoonInfoService/getTyphoonInfo"),
    CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(120),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    SEARCH_MAX_YEARS: z.coerce.number().int().min(1).max(70).default(9),
    SEARCH_MAX_RESULTS: z.coerce.number().int().min(1).max(30).default(20),
    DEBUG_TOOL_ERRORS: booleanFlag,
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    PORT: z.coerce.number().int().optional(),
    HOST: z.string().optional(),
    CORS_ALLOW_ORIGIN: z.string().optional(),
    ALLOWED_HOSTS: z.string().optional(),
});

export type ServiceConfig = Omit<z.infer<typeof envSchema>, "DEBUG_TOOL_ERRORS" | "ALLOWED_HOSTS"> & {
    DEBUG_TOOL_ERRORS: boolean;
    allowedHosts: string[];
    port: number;
    host: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    const parsed = envSchema.parse(env);
    const { DEBUG_TOOL_ERRORS, ALLOWED_HOSTS, ...rest } = parsed;

    return {
        ...rest,
        // 개발 중에는 응답에 trace를 포함. 운영에서는 false 권장.
        DEBUG_TOOL_ERRORS: DEBUG_TOOL_ERRORS ?? true,
        allowedHosts: (ALLOWED_HOSTS ?? "")
            .split(",")
            .map((host) => host.trim().toLowerCase())
            .filter((host) => host.length > 0),
        port: parsed.PORT ?? 8000,
        host: parsed.HOST ?? "0.0.0.0",
    };
}
