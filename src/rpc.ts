// MCP JSON-RPC 2.0 디스패처 (Streamable HTTP용)
// initialize / ping / tools/* / prompts/* 와 notifications/* 를 처리한다.

import { z } from "zod";
import type { Logger } from "./logger.js";
import { TtlCache } from "./lib/ttlCache.js";
import { ToolArgumentsError, type TyphoonTools } from "./tools.js";

export const LATEST_PROTOCOL_VERSION = "2025-06-18";
export const SUPPORTED_PROTOCOL_VERSIONS = [LATEST_PROTOCOL_VERSION, "2025-03-26", "2024-11-05"];

export const SERVER_INFO = {
    name: "typhoon-guide",
    version: "1.0.0",
} as const;

export const RPC_ERROR = {
    PARSE_ERROR: -32700,
    INVALID_REQUEST: -32600,
    METHOD_NOT_FOUND: -32601,
    INVALID_PARAMS: -32602,
    INTERNAL_ERROR: -32603,
} as const;

type JsonRpcId = string | number | null;

const jsonRpcRequestSchema = z.object({
    jsonrpc: z.literal("2.0"),
    id: z.union([z.string(), z.number(), z.null()]).optional(),
    method: z.string().min(1),
    params: z.record(z.unknown()).optional(),
});

type JsonRpcRequest = z.infer<typeof jsonRpcRequestSchema>;

const toolCallParamsSchema = z.object({
    name: z.string(),
    arguments: z.record(z.unknown()).optional(),
});

const promptGetParamsSchema = z.object({
    name: z.string(),
});

export type JsonRpcResponse =
    | { jsonrpc: "2.0"; id: JsonRpcId; result: unknown }
    | { jsonrpc: "2.0"; id: JsonRpcId; error: { code: number; message: string } };

// 세션 관리
export type Session = {
    createdAt: number;
    ready: boolean;
    protocolVersion: string;
};

const SESSION_TTL_SECONDS = 60 * 60;

function createSessionId(): string {
    return `session_${Date.now()}_${Math.random().toString(36).substring(2)}`;
}

export function jsonRpcResponse(id: JsonRpcId, result: unknown): JsonRpcResponse {
    return { jsonrpc: "2.0", id, result };
}

export function jsonRpcError(id: JsonRpcId, code: number, message: string): JsonRpcResponse {
    return { jsonrpc: "2.0", id, error: { code, message } };
}

function idOf(raw: unknown): JsonRpcId {
    if (typeof raw === "object" && raw !== null && "id" in raw) {
        const { id } = raw;
        if (typeof id === "string" || typeof id === "number") return id;
    }
    return null;
}

export type PromptSource = {
    name: string;
    description: string;
    load: () => string;
};

export class McpRpcDispatcher {
    private readonly sessions = new TtlCache<Session>(SESSION_TTL_SECONDS);

    constructor(
        private readonly tools: TyphoonTools,
        private readonly prompt: PromptSource,
        private readonly logger: Logger,
    ) {}

    /** 헤더의 세션 ID를 이어 쓰거나 새로 만든다. 조회할 때마다 만료가 연장된다. */
    openSession(sessionId: string | undefined, protocolVersion: string | undefined): { id: string; session: Session } {
        const id = sessionId || createSessionId();
        const existing = this.sessions.get(id);
        if (existing) {
            this.sessions.set(id, existing);
            return { id, session: existing };
        }

        // 다시 쓰이지 않는 세션 ID는 get 으로는 지워지지 않는다.
        const expired = this.sessions.prune();
        const session: Session = {
            createdAt: Date.now(),
            ready: false,
            protocolVersion: protocolVersion || LATEST_PROTOCOL_VERSION,
        };
        this.sessions.set(id, session);
        this.logger.debug({ sessionId: id, expired, active: this.sessions.size }, "session opened");
        return { id, session };
    }

    get sessionCount(): number {
        return this.sessions.size;
    }

    /** 단일 메시지 또는 배치. 응답할 것이 없으면(알림뿐이면) null. */
    async handleMessage(body: unknown, session: Session): Promise<JsonRpcResponse | JsonRpcResponse[] | null> {
        if (Array.isArray(body)) {
            if (body.length === 0) {
                return jsonRpcError(null, RPC_ERROR.INVALID_REQUEST, "Invalid Request: empty batch");
            }
            const responses: JsonRpcResponse[] = [];
            for (const message of body) {
                const response = await this.handleOne(message, session);
                if (response) responses.push(response);
            }
            return responses.length > 0 ? responses : null;
        }
        return this.handleOne(body, session);
    }

    private async handleOne(raw: unknown, session: Session): Promise<JsonRpcResponse | null> {
        const parsed = jsonRpcRequestSchema.safeParse(raw);
        if (!parsed.success) {
            return jsonRpcError(idOf(raw), RPC_ERROR.INVALID_REQUEST, "Invalid Request");
        }

        const request = parsed.data;
        const isNotification = request.id === undefined;
        try {
            const response = await this.processJsonRpcRequest(request, session);
            return isNotification ? null : response;
        } catch (err) {
            this.logger.error({ err, method: request.method }, "JSON-RPC request failed");
            if (isNotification) return null;
            const message = err instanceof Error ? err.message : String(err);
            return jsonRpcError(request.id ?? null, RPC_ERROR.INTERNAL_ERROR, message);
        }
    }

    private async processJsonRpcRequest(body: JsonRpcRequest, session: Session): Promise<JsonRpcResponse | null> {
        const id = body.id ?? null;

        // initialize
        if (body.method === "initialize") {
            const requested = body.params?.protocolVersion;
            const protocolVersion = typeof requested === "string" && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
                ? requested
                : LATEST_PROTOCOL_VERSION;
            session.protocolVersion = protocolVersion;
            return jsonRpcResponse(id, {
                protocolVersion,
                capabilities: {
                    tools: {},
                    prompts: {},
                },
                serverInfo: SERVER_INFO,
            });
        }

        // initialized 등 알림
        if (body.method.startsWith("notifications/")) {
            if (body.method === "notifications/initialized") {
                session.ready = true;
            }
            return null;
        }

        if (body.method === "ping") {
            return jsonRpcResponse(id, {});
        }

        if (body.method === "tools/list") {
            return jsonRpcResponse(id, { tools: this.tools.list() });
        }

        if (body.method === "tools/call") {
            const params = toolCallParamsSchema.safeParse(body.params);
            if (!params.success) {
                return jsonRpcError(id, RPC_ERROR.INVALID_PARAMS, "tools/call requires a tool name");
            }

            const { name, arguments: args } = params.data;
            try {
                const result = await this.tools.call(name, args);
                if (result === null) {
                    return jsonRpcError(id, RPC_ERROR.METHOD_NOT_FOUND, `Unknown tool: ${name}`);
                }
                return jsonRpcResponse(id, result);
            } catch (err) {
                if (err instanceof ToolArgumentsError) {
                    return jsonRpcError(id, RPC_ERROR.INVALID_PARAMS, err.message);
                }
                throw err;
            }
        }

        if (body.method === "prompts/list") {
            return jsonRpcResponse(id, {
                prompts: [{ name: this.prompt.name, description: this.prompt.description }],
            });
        }

        if (body.method === "prompts/get") {
            const params = promptGetParamsSchema.safeParse(body.params);
            if (!params.success || params.data.name !== this.prompt.name) {
                return jsonRpcError(id, RPC_ERROR.INVALID_PARAMS, `Unknown prompt: ${params.success ? params.data.name : "(missing)"}`);
            }
            return jsonRpcResponse(id, {
                description: this.prompt.description,
                messages: [
                    { role: "user", content: { type: "text", text: this.prompt.load() } },
                ],
            });
        }

        return jsonRpcError(id, RPC_ERROR.METHOD_NOT_FOUND, `Method not found: ${body.method}`);
    }
}
