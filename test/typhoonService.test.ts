import { describe, expect, it, vi } from "vitest";
import { formatIsoDate } from "../src/lib/time.js";
import type { TrackPoint, TyphoonDataSource, TyphoonSummary } from "../src/typhoonClient.js";
import { ConfigurationError, TyphoonService } from "../src/typhoonService.js";

// 2024-09-02 12:00 KST
const NOW = new Date("2024-09-02T03:00:00.000Z");

function summary(sequenceNumber: number, nameLocal: string, nameInternational: string, lastSeenTimestamp = "202409011500"): TyphoonSummary {
    return { sequenceNumber, nameLocal, nameInternational, firstSeenTimestamp: "202408281500", lastSeenTimestamp };
}

function point(timestamp: string, latitude: number, longitude: number): TrackPoint {
    return {
        timestamp,
        latitude,
        longitude,
        direction: "N",
        speed: 20,
        pressure: 950,
        windSpeed: 43,
        locationDescription: `${latitude},${longitude}`,
        bulletinIssueTime: timestamp,
        bulletinSequence: 1,
    };
}

function fakeSource() {
    return {
        listUniqueTyphoonsInRange: vi.fn<TyphoonDataSource["listUniqueTyphoonsInRange"]>(async () => []),
        getTrackPoints: vi.fn<TyphoonDataSource["getTrackPoints"]>(async () => []),
    };
}

function createService(source: TyphoonDataSource, options: { searchMaxYears?: number; searchMaxResults?: number } = {}) {
    return new TyphoonService({
        dataSource: { status: "configured", source },
        now: () => NOW,
        ...options,
    });
}

const unconfigured = new TyphoonService({
    dataSource: { status: "unconfigured", reason: "DATA_GO_KR_SERVICE_KEY 환경변수가 비어있습니다." },
    now: () => NOW,
});

function isoArgs(from: Date | undefined, to: Date | undefined) {
    return [from && formatIsoDate(from), to && formatIsoDate(to)];
}

describe("TyphoonService.liveSummary", () => {
    it("reports no active typhoon with the window it searched", async () => {
        const source = fakeSource();

        const result = await createService(source).liveSummary("서울");

        expect(result).toEqual({
            hasActiveTyphoon: false,
            message: "현재 조회 범위(최근 며칠) 내에 태풍 정보가 확인되지 않습니다.",
            range: { from: "2024-08-30", to: "2024-09-03" },
        });
        expect(source.getTrackPoints).not.toHaveBeenCalled();
    });

    it("summarizes the most recent typhoon near the requested region", async () => {
        const source = fakeSource();
        source.listUniqueTyphoonsInRange.mockResolvedValue([
            summary(11, "힌남노", "HINNAMNOR", "202409020900"),
            summary(10, "산산", "SHANSHAN", "202408300300"),
        ]);
        source.getTrackPoints.mockResolvedValue([
            point("202409011500", 33.0, 127.0),
            point("202409020300", 37.5665, 126.978),
            point("202409020900", 39.0, 128.0),
        ]);

        const result = await createService(source).liveSummary(" 서울특별시 ");

        const [seq, from, to] = source.getTrackPoints.mock.calls[0] ?? [];
        expect(seq).toBe(11);
        expect(isoArgs(from, to)).toEqual(["2024-08-26", "2024-09-04"]);

        expect(result).toMatchObject({
            hasActiveTyphoon: true,
            typhoon: { sequenceNumber: 11, nameLocal: "힌남노" },
            latestPoint: {
                time: "2024-09-02 09:00",
                latitude: 39,
                longitude: 128,
                windSpeed: 43,
                pressure: 950,
            },
            location: {
                input: "서울특별시",
                geocoded: { latitude: 37.5665, longitude: 126.978 },
            },
            proximity: {
                closest: { time: "2024-09-02 03:00", distanceKm: 0 },
                impactWindow: { start: "2024-09-01 21:00", end: "2024-09-02 09:00" },
            },
            dataRangeUsed: { from: "2024-08-30", to: "2024-09-03" },
        });
    });

    it("skips proximity when the region is unknown or absent", async () => {
        const source = fakeSource();
        source.listUniqueTyphoonsInRange.mockResolvedValue([summary(11, "힌남노", "HINNAMNOR")]);
        source.getTrackPoints.mockResolvedValue([point("202409011500", 33.0, 127.0)]);
        const service = createService(source);

        const unknown = await service.liveSummary("뉴욕");
        expect(unknown).toMatchObject({
            location: { input: "뉴욕", geocoded: null },
            proximity: null,
        });

        const absent = await service.liveSummary();
        expect(absent).toMatchObject({
            location: { input: null, geocoded: null, note: "지역이 없으면 전국 공통 요약만 제공합니다." },
            proximity: null,
        });
    });

    it("returns a null latest point when the typhoon has no track", async () => {
        const source = fakeSource();
        source.listUniqueTyphoonsInRange.mockResolvedValue([summary(11, "힌남노", "HINNAMNOR")]);

        const result = await createService(source).liveSummary("제주");

        expect(result).toMatchObject({ hasActiveTyphoon: true, latestPoint: null, proximity: null });
    });

    it("throws ConfigurationError without a service key", async () => {
        await expect(unconfigured.liveSummary()).rejects.toBeInstanceOf(ConfigurationError);
    });

    it("propagates upstream failures", async () => {
        const source = fakeSource();
        source.listUniqueTyphoonsInRange.mockRejectedValue(new Error("Typhoon API request failed: 500 Internal Server Error"));

        await expect(createService(source).liveSummary()).rejects.toThrow("Typhoon API request failed: 500 Internal Server Error");
    });
});

describe("TyphoonService.searchPastTyphoons", () => {
    it("requires a query or a year before contacting the source", async () => {
        const result = await unconfigured.searchPastTyphoons("  ");
        expect(result).toEqual({ ok: false, message: "검색어(query) 또는 연도(year) 중 하나는 필요합니다." });
    });

    it("scans years backwards and stops at the first year with a match", async () => {
        const source = fakeSource();
        source.listUniqueTyphoonsInRange
            .mockResolvedValueOnce([summary(3, "산산", "SHANSHAN")])
            .mockResolvedValueOnce([summary(11, "힌남노", "HINNAMNOR"), summary(12, "무이파", "MUIFA")])
            .mockResolvedValueOnce([summary(6, "힌남노", "HINNAMNOR")]);

        const result = await createService(source).searchPastTyphoons("hinnam");

        expect(source.listUniqueTyphoonsInRange).toHaveBeenCalledTimes(2);
        const years = source.listUniqueTyphoonsInRange.mock.calls.map(([from, to]) => isoArgs(from, to));
        expect(years).toEqual([
            ["2024-01-01", "2024-12-31"],
            ["2023-01-01", "2023-12-31"],
        ]);
        expect(result).toMatchObject({
            ok: true,
            query: "hinnam",
            year: null,
            results: [{ sequenceNumber: 11, nameInternational: "HINNAMNOR" }],
        });
    });

    it("matches local names by substring", async () => {
        const source = fakeSource();
        source.listUniqueTyphoonsInRange.mockResolvedValue([summary(11, "힌남노", "HINNAMNOR"), summary(12, "무이파", "MUIFA")]);

        const result = await createService(source).searchPastTyphoons("남노");

        expect(result).toMatchObject({ ok: true, results: [{ sequenceNumber: 11 }] });
    });

    it("gives up after the configured number of years", async () => {
        const source = fakeSource();

        const result = await createService(source, { searchMaxYears: 3 }).searchPastTyphoons("없는태풍");

        expect(source.listUniqueTyphoonsInRange).toHaveBeenCalledTimes(3);
        expect(result).toMatchObject({ ok: true, results: [] });
    });

    it("searches only the requested year and caps the results", async () => {
        const source = fakeSource();
        source.listUniqueTyphoonsInRange.mockResolvedValue([
            summary(1, "하나", "ONE"),
            summary(2, "둘", "TWO"),
            summary(3, "셋", "THREE"),
        ]);

        const result = await createService(source, { searchMaxResults: 2 }).searchPastTyphoons(undefined, 2019);

        expect(source.listUniqueTyphoonsInRange).toHaveBeenCalledTimes(1);
        const [from, to] = source.listUniqueTyphoonsInRange.mock.calls[0] ?? [];
        expect(isoArgs(from, to)).toEqual(["2019-01-01", "2019-12-31"]);
        expect(result).toMatchObject({ ok: true, query: "", year: 2019 });
        expect(result.ok && result.results.map((t) => t.sequenceNumber)).toEqual([1, 2]);
    });
});

describe("TyphoonService.pastTrack", () => {
    it("rejects a non-positive or fractional typSeq without fetching", async () => {
        const source = fakeSource();
        const service = createService(source);

        expect(await service.pastTrack(0)).toEqual({ ok: false, message: "typSeq는 1 이상의 정수여야 합니다." });
        expect(await service.pastTrack(-3)).toMatchObject({ ok: false });
        expect(await service.pastTrack(1.5)).toMatchObject({ ok: false });
        expect(source.getTrackPoints).not.toHaveBeenCalled();
    });

    it("uses an explicit range as is", async () => {
        const source = fakeSource();

        const result = await createService(source).pastTrack(11, "20220828", "20220907");

        expect(source.getTrackPoints).toHaveBeenCalledTimes(1);
        const [, from, to] = source.getTrackPoints.mock.calls[0] ?? [];
        expect(isoArgs(from, to)).toEqual(["2022-08-28", "2022-09-07"]);
        expect(result).toMatchObject({ ok: true, typSeq: 11, range: { from: "2022-08-28", to: "2022-09-07" }, count: 0, points: [] });
    });

    it("rejects malformed dates", async () => {
        const result = await createService(fakeSource()).pastTrack(11, "2022-08-28", "20220907");
        expect(result).toEqual({ ok: false, message: "기간은 YYYYMMDD 형식이어야 합니다." });
    });

    it("falls back from the recent window to whole past years", async () => {
        const source = fakeSource();
        const points = [point("202309011500", 30, 128)];
        source.getTrackPoints
            .mockResolvedValueOnce([])
            .mockResolvedValueOnce([])
            .mockResolvedValueOnce(points);

        const result = await createService(source).pastTrack(6, "20230801");

        const ranges = source.getTrackPoints.mock.calls.map(([, from, to]) => isoArgs(from, to));
        expect(ranges).toEqual([
            ["2024-08-03", "2024-09-03"],
            ["2024-01-01", "2024-12-31"],
            ["2023-01-01", "2023-12-31"],
        ]);
        expect(result).toMatchObject({ ok: true, typSeq: 6, range: { from: "2023-01-01", to: "2023-12-31" }, count: 1, points });
    });

    it("keeps the recent window when nothing is found anywhere", async () => {
        const source = fakeSource();

        const result = await createService(source).pastTrack(99);

        expect(source.getTrackPoints).toHaveBeenCalledTimes(10);
        expect(result).toMatchObject({ ok: true, range: { from: "2024-08-03", to: "2024-09-03" }, count: 0 });
    });
});
