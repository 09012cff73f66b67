import { haversineKm } from "./lib/geo.js";
import { formatTimestamp, humanizeTimestamp, parseTimestamp, shiftHours } from "./lib/time.js";
import type { TrackPoint } from "./typhoonClient.js";

export const IMPACT_WINDOW_HOURS = 6;

export type ClosestApproach = {
    time: string;
    distanceKm: number;
    typhoonLatitude: number;
    typhoonLongitude: number;
    locationDescription: string | number | null;
};

export type ImpactWindow = {
    start: string;
    end: string;
    center: string;
    basis: "heuristic";
    note: string;
};

export type ProximitySummary = {
    closest: ClosestApproach | null;
    impactWindow: ImpactWindow | null;
};

/**
 * 지정 좌표에 가장 가까웠던 경로 포인트와, 그 시각 ±6시간의 '영향 가능 시간대'.
 * 동률이면 먼저 나온(이른) 포인트를 쓴다.
 */
export function summarizeTrackNearLocation(points: readonly TrackPoint[], latitude: number, longitude: number): ProximitySummary {
    let best: { point: TrackPoint; distanceKm: number } | null = null;
    for (const point of points) {
        const distanceKm = haversineKm(latitude, longitude, point.latitude, point.longitude);
        if (best === null || distanceKm < best.distanceKm) {
            best = { point, distanceKm };
        }
    }

    if (best === null) {
        return { closest: null, impactWindow: null };
    }

    const centerMs = parseTimestamp(best.point.timestamp);
    const impactWindow: ImpactWindow | null = centerMs === null
        ? null
        : {
                start: formatTimestamp(shiftHours(centerMs, -IMPACT_WINDOW_HOURS)),
                end: formatTimestamp(shiftHours(centerMs, IMPACT_WINDOW_HOURS)),
                center: formatTimestamp(centerMs),
                basis: "heuristic",
                note: "최근접 시각 ±6시간을 단순 추정한 값이며 예보가 아닙니다.",
            };

    return {
        closest: {
            time: humanizeTimestamp(best.point.timestamp),
            distanceKm: Math.round(best.distanceKm * 10) / 10,
            typhoonLatitude: best.point.latitude,
            typhoonLongitude: best.point.longitude,
            locationDescription: best.point.locationDescription,
        },
        impactWindow,
    };
}
