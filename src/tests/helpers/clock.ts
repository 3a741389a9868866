/**
 * Manually advanced clock shared by the codec and the fake stores
 */
export class TestClock {
    constructor(private current: number = Date.UTC(2030, 0, 1, 12, 0, 0)) {}

    now = (): number => this.current;

    advanceSeconds(seconds: number): void {
        this.current += seconds * 1000;
    }
}
