import pino, { type Logger } from "pino";
import type { ServiceConfig } from "./config.js";

export type { Logger };

/**
 * stdio 모드에서는 stdout이 프로토콜 채널이므로 로그를 stderr(fd 2)로 보낸다.
 */
export function createLogger(config: Pick<ServiceConfig, "LOG_LEVEL">, options: { stderr?: boolean } = {}): Logger {
    return pino(
        {
            level: config.LOG_LEVEL,
            base: undefined,
            timestamp: pino.stdTimeFunctions.isoTime,
        },
        pino.destination(options.stderr ? 2 : 1),
    );
}
