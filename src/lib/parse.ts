// 공공데이터 응답 필드 파서. 실패해도 예외 대신 기본값을 돌려주되, ok 플래그로 실패를 알린다.

export type ParseOutcome<T> = {
    value: T;
    ok: boolean;
};

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** 문자열 필드. null/undefined는 빈 문자열. */
export function textOf(raw: unknown): string {
    if (raw === null || raw === undefined) return "";
    return String(raw).trim();
}

export function parseIntOr(raw: unknown, fallback: number): ParseOutcome<number> {
    if (typeof raw === "number" && Number.isFinite(raw)) {
        return { value: Math.trunc(raw), ok: true };
    }
    if (typeof raw === "string") {
        const text = raw.trim();
        if (INTEGER_PATTERN.test(text)) {
            return { value: Number.parseInt(text, 10), ok: true };
        }
    }
    return { value: fallback, ok: false };
}

export function parseFloatOr(raw: unknown, fallback: number): ParseOutcome<number> {
    if (typeof raw === "number" && Number.isFinite(raw)) {
        return { value: raw, ok: true };
    }
    if (typeof raw === "string") {
        const text = raw.trim();
        if (DECIMAL_PATTERN.test(text)) {
            const value = Number(text);
            if (Number.isFinite(value)) return { value, ok: true };
        }
    }
    return { value: fallback, ok: false };
}

/** 원본 값을 그대로 노출할 스칼라 필드 (숫자/문자열 외에는 null). */
export function scalarOf(raw: unknown): string | number | null {
    if (typeof raw === "string" || typeof raw === "number") return raw;
    return null;
}
