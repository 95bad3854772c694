/**
 * Counting semaphore for bounding concurrently held resources. Never blocks:
 * callers that find it full fail instead of waiting.
 */
export class Semaphore {
    private current = 0;

    constructor(private readonly max: number) {
        if (!Number.isInteger(max) || max < 1) {
            throw new RangeError(`Semaphore capacity must be a positive integer, got ${max}`);
        }
    }

    /** Try to acquire a slot. Returns true if acquired, false if at capacity. */
    tryAcquire(): boolean {
        if (this.current >= this.max) return false;
        this.current++;
        return true;
    }

    release(): void {
        if (this.current > 0) this.current--;
    }

    get active(): number {
        return this.current;
    }

    get capacity(): number {
        return this.max;
    }
}
