// 공공데이터포털 기상청 태풍정보 조회서비스 (getTyphoonInfo) 클라이언트
// - 페이지 단위 응답을 (기간, 페이지, 행 수) 키로 TTL 캐시
// - 통신 오류는 재시도 없이 그대로 호출자에게 전파

import type { Logger } from "./logger.js";
import { TtlCache } from "./lib/ttlCache.js";
import { isRecord, parseFloatOr, parseIntOr, scalarOf, textOf } from "./lib/parse.js";
import { formatCompactDate, parseTimestamp } from "./lib/time.js";

export const DEFAULT_TYPHOON_API_URL = "https://apis.data.go.kr/1360000/TyphoonInfoService/getTyphoonInfo";

export type TyphoonSummary = {
    sequenceNumber: number;
    nameLocal: string;
    nameInternational: string;
    firstSeenTimestamp: string;
    lastSeenTimestamp: string;
};

export type TrackPoint = {
    timestamp: string;
    latitude: number;
    longitude: number;
    direction: string | number | null;
    speed: string | number | null;
    pressure: string | number | null;
    windSpeed: string | number | null;
    locationDescription: string | number | null;
    bulletinIssueTime: string | number | null;
    bulletinSequence: string | number | null;
};

export type PageOptions = {
    maxPages?: number;
    pageSize?: number;
};

/** 서비스 계층이 의존하는 조회 인터페이스 */
export interface TyphoonDataSource {
    listUniqueTyphoonsInRange(from: Date, to: Date, options?: PageOptions): Promise<TyphoonSummary[]>;
    getTrackPoints(typSeq: number, from: Date, to: Date, options?: PageOptions): Promise<TrackPoint[]>;
}

export class UpstreamError extends Error {
    constructor(message: string, readonly status?: number) {
        super(message);
        this.name = "UpstreamError";
    }
}

type BulletinItem = Record<string, unknown>;

export type TyphoonClientOptions = {
    serviceKey: string;
    baseUrl?: string;
    cache?: TtlCache<unknown>;
    timeoutMs?: number;
    logger: Logger;
    fetchFn?: typeof fetch;
};

/** response.body.items.item. 단일 객체는 1개짜리 목록으로. */
export function itemsOf(payload: unknown): BulletinItem[] {
    const body = isRecord(payload) && isRecord(payload.response) ? payload.response.body : undefined;
    const items = isRecord(body) ? body.items : undefined;
    const item = isRecord(items) ? items.item : undefined;
    if (isRecord(item)) return [item];
    if (Array.isArray(item)) return item.filter(isRecord);
    return [];
}

export function totalCountOf(payload: unknown): number {
    const body = isRecord(payload) && isRecord(payload.response) ? payload.response.body : undefined;
    return isRecord(body) ? parseIntOr(body.totalCount, 0).value : 0;
}

export class TyphoonClient implements TyphoonDataSource {
    private readonly serviceKey: string;
    private readonly baseUrl: string;
    private readonly cache: TtlCache<unknown>;
    private readonly timeoutMs: number;
    private readonly logger: Logger;
    private readonly fetchFn: typeof fetch;

    constructor(options: TyphoonClientOptions) {
        this.serviceKey = options.serviceKey;
        this.baseUrl = options.baseUrl ?? DEFAULT_TYPHOON_API_URL;
        this.cache = options.cache ?? new TtlCache<unknown>(120);
        this.timeoutMs = options.timeoutMs ?? 15_000;
        this.logger = options.logger;
        this.fetchFn = options.fetchFn ?? fetch;
    }

    async fetchTyphoonInfo(fromYmd: string, toYmd: string, pageNo = 1, numOfRows = 100): Promise<unknown> {
        const cacheKey = `getTyphoonInfo:${fromYmd}:${toYmd}:${pageNo}:${numOfRows}`;
        const cached = this.cache.get(cacheKey);
        if (cached !== undefined) {
            this.logger.debug({ cacheKey }, "typhoon info cache hit");
            return cached;
        }

        const queryParams = new URLSearchParams({
            serviceKey: this.serviceKey,
            pageNo: String(pageNo),
            numOfRows: String(numOfRows),
            dataType: "JSON",
            fromTmFc: fromYmd,
            toTmFc: toYmd,
        });

        const res = await this.fetchFn(`${this.baseUrl}?${queryParams}`, {
            signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (!res.ok) {
            await res.body?.cancel();
            throw new UpstreamError(`Typhoon API request failed: ${res.status} ${res.statusText}`, res.status);
        }

        // 인증키 오류 등은 200 + XML 본문으로 오는 경우가 있다.
        const text = await res.text();
        let payload: unknown;
        try {
            payload = JSON.parse(text);
        } catch {
            throw new UpstreamError(`Typhoon API returned a non-JSON body: ${text.slice(0, 200)}`, res.status);
        }

        this.cache.set(cacheKey, payload);
        return payload;
    }

    /**
     * 페이지를 순서대로 가져와 items를 넘겨준다.
     * 빈 페이지이거나 pageNo * pageSize >= totalCount 이면 종료.
     */
    private async *pages(from: Date, to: Date, options: PageOptions = {}): AsyncGenerator<BulletinItem[]> {
        const maxPages = options.maxPages ?? 20;
        const pageSize = options.pageSize ?? 100;
        const fromYmd = formatCompactDate(from);
        const toYmd = formatCompactDate(to);

        for (let page = 1; page <= maxPages; page++) {
            const payload = await this.fetchTyphoonInfo(fromYmd, toYmd, page, pageSize);
            const items = itemsOf(payload);
            if (items.length === 0) return;

            yield items;

            if (page * pageSize >= totalCountOf(payload)) return;
        }
    }

    /** 기간 내 등장하는 태풍(typSeq)별 요약. 최근 발표 순. */
    async listUniqueTyphoonsInRange(from: Date, to: Date, options?: PageOptions): Promise<TyphoonSummary[]> {
        const seen = new Map<number, TyphoonSummary & { firstMs: number | null; lastMs: number | null }>();

        for await (const items of this.pages(from, to, options)) {
            let skipped = 0;
            for (const item of items) {
                const seq = parseIntOr(item.typSeq, 0);
                if (!seq.ok) {
                    skipped++;
                    continue;
                }

                const typTm = textOf(item.typTm);
                const ms = parseTimestamp(typTm);
                const current = seen.get(seq.value);

                if (!current) {
                    seen.set(seq.value, {
                        sequenceNumber: seq.value,
                        nameLocal: textOf(item.typName),
                        nameInternational: textOf(item.typEn),
                        firstSeenTimestamp: typTm,
                        lastSeenTimestamp: typTm,
                        firstMs: ms,
                        lastMs: ms,
                    });
                    continue;
                }

                if (ms === null) continue;
                if (current.firstMs === null || ms < current.firstMs) {
                    current.firstMs = ms;
                    current.firstSeenTimestamp = typTm;
                }
                if (current.lastMs === null || ms > current.lastMs) {
                    current.lastMs = ms;
                    current.lastSeenTimestamp = typTm;
                }
            }
            if (skipped > 0) {
                this.logger.debug({ skipped }, "skipped bulletins without a numeric typSeq");
            }
        }

        return [...seen.values()]
            .sort((a, b) => (b.lastMs ?? Number.MIN_SAFE_INTEGER) - (a.lastMs ?? Number.MIN_SAFE_INTEGER))
            .map(({ firstMs: _firstMs, lastMs: _lastMs, ...summary }) => summary);
    }

    /**
     * 기간 내 특정 typSeq의 발표 기반 경로 포인트. 시간순.
     * 같은 통보문이 여러 번 나와도 중복 제거하지 않는다.
     */
    async getTrackPoints(typSeq: number, from: Date, to: Date, options?: PageOptions): Promise<TrackPoint[]> {
        const points: Array<{ point: TrackPoint; ms: number | null }> = [];

        for await (const items of this.pages(from, to, options)) {
            let skipped = 0;
            for (const item of items) {
                if (parseIntOr(item.typSeq, 0).value !== typSeq) continue;

                const lat = parseFloatOr(item.typLat, Number.NaN);
                const lon = parseFloatOr(item.typLon, Number.NaN);
                if (!lat.ok || !lon.ok) {
                    skipped++;
                    continue;
                }

                const typTm = textOf(item.typTm);
                points.push({
                    ms: parseTimestamp(typTm),
                    point: {
                        timestamp: typTm,
                        latitude: lat.value,
                        longitude: lon.value,
                        direction: scalarOf(item.typDir),
                        speed: scalarOf(item.typSp),
                        pressure: scalarOf(item.typPs),
                        windSpeed: scalarOf(item.typWs),
                        locationDescription: scalarOf(item.typLoc),
                        bulletinIssueTime: scalarOf(item.tmFc),
                        bulletinSequence: scalarOf(item.tmSeq),
                    },
                });
            }
            if (skipped > 0) {
                this.logger.debug({ typSeq, skipped }, "skipped bulletins with unparsable coordinates");
            }
        }

        return points
            .sort((a, b) => (a.ms ?? Number.MIN_SAFE_INTEGER) - (b.ms ?? Number.MIN_SAFE_INTEGER))
            .map(({ point }) => point);
    }
}
