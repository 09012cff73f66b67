import type { ServiceConfig } from "./config.js";
import { Geocoder } from "./geocoder.js";
import type { Coordinate } from "./lib/geo.js";
import { TtlCache } from "./lib/ttlCache.js";
import { addDays, formatIsoDate, humanizeTimestamp, kstToday, parseCompactDate, yearRange } from "./lib/time.js";
import type { Logger } from "./logger.js";
import { summarizeTrackNearLocation, type ProximitySummary } from "./proximity.js";
import { TyphoonClient, type TrackPoint, type TyphoonDataSource, type TyphoonSummary } from "./typhoonClient.js";

export const SERVICE_KEY_REQUIRED_MESSAGE = "DATA_GO_KR_SERVICE_KEY 설정이 필요합니다.";

/** 인증키가 없으면 서버는 뜨되, 조회 시점에 이 상태를 보고 안내한다. */
export type DataSourceState =
    | { status: "configured"; source: TyphoonDataSource }
    | { status: "unconfigured"; reason: string };

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

export type DateRange = { from: string; to: string };

export type LiveSummaryResult =
    | { hasActiveTyphoon: false; message: string; range: DateRange }
    | {
            hasActiveTyphoon: true;
            typhoon: TyphoonSummary;
            latestPoint: {
                time: string;
                latitude: number;
                longitude: number;
                locationDescription: string | number | null;
                windSpeed: string | number | null;
                pressure: string | number | null;
            } | null;
            location: {
                input: string | null;
                geocoded: Coordinate | null;
                note: string;
            };
            proximity: ProximitySummary | null;
            dataRangeUsed: DateRange;
            disclaimer: string;
        };

export type InvalidInputResult = { ok: false; message: string };

export type SearchResult =
    | InvalidInputResult
    | { ok: true; query: string; year: number | null; results: TyphoonSummary[]; hint: string };

export type TrackResult =
    | InvalidInputResult
    | { ok: true; typSeq: number; range: DateRange; count: number; points: TrackPoint[]; disclaimer: string };

export type TyphoonServiceOptions = {
    dataSource: DataSourceState;
    geocoder?: Geocoder;
    now?: () => Date;
    searchMaxYears?: number;
    searchMaxResults?: number;
};

const EARLIEST_SEARCH_YEAR = 1951;
const TRACK_FALLBACK_YEARS = 9;

function toRange(from: Date, to: Date): DateRange {
    return { from: formatIsoDate(from), to: formatIsoDate(to) };
}

export class TyphoonService {
    private readonly dataSource: DataSourceState;
    private readonly geocoder: Geocoder;
    private readonly now: () => Date;
    private readonly searchMaxYears: number;
    private readonly searchMaxResults: number;

    constructor(options: TyphoonServiceOptions) {
        this.dataSource = options.dataSource;
        this.geocoder = options.geocoder ?? new Geocoder();
        this.now = options.now ?? (() => new Date());
        this.searchMaxYears = options.searchMaxYears ?? 9;
        this.searchMaxResults = options.searchMaxResults ?? 20;
    }

    private source(): TyphoonDataSource {
        if (this.dataSource.status === "unconfigured") {
            throw new ConfigurationError(this.dataSource.reason);
        }
        return this.dataSource.source;
    }

    private today(): Date {
        return kstToday(this.now());
    }

    /** 최근(3일 전~내일) 기준 현재/근접 태풍 요약과 지역 기준 근접 시각 */
    async liveSummary(location?: string): Promise<LiveSummaryResult> {
        const source = this.source();
        const today = this.today();
        const from = addDays(today, -3);
        const to = addDays(today, 1);

        const typhoons = await source.listUniqueTyphoonsInRange(from, to);
        const typhoon = typhoons[0];
        if (!typhoon) {
            return {
                hasActiveTyphoon: false,
                message: "현재 조회 범위(최근 며칠) 내에 태풍 정보가 확인되지 않습니다.",
                range: toRange(from, to),
            };
        }

        // track point는 발표 기반이라 조회 기간을 7일 전~모레로 넓힌다.
        const points = await source.getTrackPoints(typhoon.sequenceNumber, addDays(today, -7), addDays(today, 2));

        const input = location?.trim() || null;
        const geocoded = this.geocoder.geocode(input ?? undefined);
        const proximity = geocoded && points.length > 0
            ? summarizeTrackNearLocation(points, geocoded.latitude, geocoded.longitude)
            : null;
        const last = points.at(-1);

        return {
            hasActiveTyphoon: true,
            typhoon,
            latestPoint: last
                ? {
                        time: humanizeTimestamp(last.timestamp),
                        latitude: last.latitude,
                        longitude: last.longitude,
                        locationDescription: last.locationDescription,
                        windSpeed: last.windSpeed,
                        pressure: last.pressure,
                    }
                : null,
            location: {
                input,
                geocoded,
                note: input
                    ? "지역을 제공하면 해당 지역 중심 좌표(대략)로 근접 시각을 추정합니다."
                    : "지역이 없으면 전국 공통 요약만 제공합니다.",
            },
            proximity,
            dataRangeUsed: toRange(from, to),
            disclaimer: "통보문 기반 좌표로 '근접 시각'을 단순 추정한 결과입니다. 정확한 상륙/통과 시각은 기상청 최신 태풍정보/특보를 함께 확인하세요.",
        };
    }

    /** 이름 일부 또는 연도로 과거 태풍 검색 */
    async searchPastTyphoons(query?: string, year?: number): Promise<SearchResult> {
        const q = (query ?? "").trim();
        if (!q && year === undefined) {
            return { ok: false, message: "검색어(query) 또는 연도(year) 중 하나는 필요합니다." };
        }
        if (year !== undefined && year < EARLIEST_SEARCH_YEAR) {
            return { ok: false, message: `연도(year)는 ${EARLIEST_SEARCH_YEAR}년 이후여야 합니다.` };
        }

        const source = this.source();
        const currentYear = this.today().getUTCFullYear();
        const years: number[] = [];
        if (year !== undefined) {
            years.push(year);
        } else {
            const oldest = Math.max(currentYear - this.searchMaxYears, EARLIEST_SEARCH_YEAR - 1);
            for (let y = currentYear; y > oldest; y--) years.push(y);
        }

        const needle = q.toLowerCase();
        const matches: TyphoonSummary[] = [];
        for (const y of years) {
            const { from, to } = yearRange(y);
            const typhoons = await source.listUniqueTyphoonsInRange(from, to);
            for (const t of typhoons) {
                if (!q || t.nameLocal.includes(q) || t.nameInternational.toLowerCase().includes(needle)) {
                    matches.push(t);
                }
            }
            if (matches.length > 0 && year === undefined) break;
        }

        return {
            ok: true,
            query: q,
            year: year ?? null,
            results: matches.slice(0, this.searchMaxResults),
            hint: "결과의 sequenceNumber(태풍번호)를 typSeq로 get_past_typhoon_track을 호출하면 경로 포인트를 받을 수 있습니다.",
        };
    }

    /** 태풍번호(typSeq)의 경로 포인트. 기간이 없으면 최근 30일, 이후 연 단위로 거슬러 탐색. */
    async pastTrack(typSeq: number, fromYmd?: string, toYmd?: string): Promise<TrackResult> {
        if (!Number.isInteger(typSeq) || typSeq <= 0) {
            return { ok: false, message: "typSeq는 1 이상의 정수여야 합니다." };
        }

        const explicit = Boolean(fromYmd && toYmd);
        let from: Date;
        let to: Date;
        if (fromYmd && toYmd) {
            const parsedFrom = parseCompactDate(fromYmd);
            const parsedTo = parseCompactDate(toYmd);
            if (!parsedFrom || !parsedTo) {
                return { ok: false, message: "기간은 YYYYMMDD 형식이어야 합니다." };
            }
            from = parsedFrom;
            to = parsedTo;
        } else {
            const today = this.today();
            from = addDays(today, -30);
            to = addDays(today, 1);
        }

        const source = this.source();
        let points = await source.getTrackPoints(typSeq, from, to);

        if (points.length === 0 && !explicit) {
            const currentYear = this.today().getUTCFullYear();
            for (let y = currentYear; y > currentYear - TRACK_FALLBACK_YEARS; y--) {
                const range = yearRange(y);
                points = await source.getTrackPoints(typSeq, range.from, range.to);
                if (points.length > 0) {
                    from = range.from;
                    to = range.to;
                    break;
                }
            }
        }

        return {
            ok: true,
            typSeq,
            range: toRange(from, to),
            count: points.length,
            points,
            disclaimer: "공공데이터포털 태풍 통보문 기반 포인트입니다(베스트트랙과 다를 수 있음).",
        };
    }
}

export function createTyphoonService(
    config: Pick<ServiceConfig, "DATA_GO_KR_SERVICE_KEY" | "TYPHOON_API_URL" | "CACHE_TTL_SECONDS" | "REQUEST_TIMEOUT_MS" | "SEARCH_MAX_YEARS" | "SEARCH_MAX_RESULTS">,
    logger: Logger,
): TyphoonService {
    const serviceKey = config.DATA_GO_KR_SERVICE_KEY;
    const dataSource: DataSourceState = serviceKey
        ? {
                status: "configured",
                source: new TyphoonClient({
                    serviceKey,
                    baseUrl: config.TYPHOON_API_URL,
                    cache: new TtlCache<unknown>(config.CACHE_TTL_SECONDS),
                    timeoutMs: config.REQUEST_TIMEOUT_MS,
                    logger: logger.child({ component: "typhoonClient" }),
                }),
            }
        : { status: "unconfigured", reason: "DATA_GO_KR_SERVICE_KEY 환경변수가 비어있습니다. .env를 설정하세요." };

    if (dataSource.status === "unconfigured") {
        logger.warn("DATA_GO_KR_SERVICE_KEY is not set; typhoon tools will report a configuration error");
    }

    return new TyphoonService({
        dataSource,
        searchMaxYears: config.SEARCH_MAX_YEARS,
        searchMaxResults: config.SEARCH_MAX_RESULTS,
    });
}
