import type { Coordinate } from "./lib/geo.js";

export type RegionCenter = readonly [name: string, coordinate: Coordinate];

// 도/광역시 중심의 대략 좌표. 읍면동 수준은 다루지 않는다.
export const KOREA_REGION_CENTERS: readonly RegionCenter[] = Object.freeze([
    // 특별/광역시
    ["서울", { latitude: 37.5665, longitude: 126.978 }],
    ["부산", { latitude: 35.1796, longitude: 129.0756 }],
    ["대구", { latitude: 35.8714, longitude: 128.6014 }],
    ["인천", { latitude: 37.4563, longitude: 126.7052 }],
    ["광주", { latitude: 35.1595, longitude: 126.8526 }],
    ["대전", { latitude: 36.3504, longitude: 127.3845 }],
    ["울산", { latitude: 35.5384, longitude: 129.3114 }],
    ["세종", { latitude: 36.48, longitude: 127.289 }],

    // 도
    ["경기", { latitude: 37.4138, longitude: 127.5183 }],
    ["강원", { latitude: 37.8228, longitude: 128.1555 }],
    ["충북", { latitude: 36.6357, longitude: 127.4912 }],
    ["충남", { latitude: 36.5184, longitude: 126.8 }],
    ["전북", { latitude: 35.7175, longitude: 127.153 }],
    ["전남", { latitude: 34.8161, longitude: 126.463 }],
    ["경북", { latitude: 36.4919, longitude: 128.8889 }],
    ["경남", { latitude: 35.4606, longitude: 128.2132 }],
    ["제주", { latitude: 33.4996, longitude: 126.5312 }],

    // 자주 쓰는 도시/권역
    ["제주시", { latitude: 33.4996, longitude: 126.5312 }],
    ["서귀포", { latitude: 33.2541, longitude: 126.5601 }],
] as const);

const ADMINISTRATIVE_SUFFIX = /(특별자치도|특별자치시|광역시|특별시|도|시)$/;

export function normalizeRegion(text: string): string {
    return text.replace(/\s+/g, "").replace(ADMINISTRATIVE_SUFFIX, "");
}

export class Geocoder {
    constructor(private readonly regions: readonly RegionCenter[] = KOREA_REGION_CENTERS) {}

    /**
     * 1) 원문에 포함된 첫 지역명
     * 2) 행정구역 접미사를 뗀 뒤 정확히 일치하는 지역명
     */
    geocode(region: string | undefined): Coordinate | null {
        const raw = (region ?? "").trim();
        if (!raw) return null;

        for (const [name, coordinate] of this.regions) {
            if (raw.includes(name)) return coordinate;
        }

        const normalized = normalizeRegion(raw);
        for (const [name, coordinate] of this.regions) {
            if (normalizeRegion(name) === normalized) return coordinate;
        }
        return null;
    }
}
