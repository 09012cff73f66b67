type CacheEntry<V> = {
    value: V;
    expiresAt: number;
};

/**
 * 단일 프로세스용 메모리 TTL 캐시.
 * 만료된 항목은 조회 시점이나 prune() 호출 때 제거한다 (백그라운드 타이머 없음).
 */
export class TtlCache<V> {
    private readonly store = new Map<string, CacheEntry<V>>();

    constructor(private readonly ttlSeconds: number = 120) {
        if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
            throw new Error("ttlSeconds must be a positive number");
        }
    }

    get(key: string): V | undefined {
        const entry = this.store.get(key);
        if (!entry) return undefined;
        if (entry.expiresAt < Date.now()) {
            this.store.delete(key);
            return undefined;
        }
        return entry.value;
    }

    set(key: string, value: V, ttlSeconds?: number): void {
        const ttl = ttlSeconds ?? this.ttlSeconds;
        this.store.set(key, { value, expiresAt: Date.now() + ttl * 1000 });
    }

    /** 만료된 항목을 모두 지우고 지운 개수를 돌려준다. */
    prune(): number {
        const now = Date.now();
        let removed = 0;
        for (const [key, entry] of this.store) {
            if (entry.expiresAt < now) {
                this.store.delete(key);
                removed++;
            }
        }
        return removed;
    }

    get size(): number {
        return this.store.size;
    }

    clear(): void {
        this.store.clear();
    }
}
