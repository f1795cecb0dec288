export interface Clock {
	now(): Date,
}

export const systemClock: Clock = {
	now: () => new Date(),
};

/**
 * テスト用の時計。advance() を呼ぶまで時刻が進まない
 */
export class ManualClock implements Clock {
	private current: number;

	constructor(start: Date | string = '2024-01-01T00:00:00Z') {
		this.current = new Date(start).getTime();
	}

	now() {
		return new Date(this.current);
	}

	advance(ms: number) {
		this.current += ms;
		return this.now();
	}

	set(time: Date | string) {
		this.current = new Date(time).getTime();
	}
}
