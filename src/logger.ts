export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

type Sink = (line: string) => void;

/**
 * Writes `<ISO timestamp>: <message>` lines to the console.
 * warn and error go to stderr.
 */
export class ConsoleLogger implements Logger {
	private readonly threshold: number;
	private readonly out: Sink;
	private readonly err: Sink;
	private readonly clock: () => Date;

	constructor(options?: { level?: LogLevel; out?: Sink; err?: Sink; clock?: () => Date }) {
		this.threshold = LEVELS[options?.level ?? 'info'];
		this.out = options?.out ?? ((line) => console.log(line));
		this.err = options?.err ?? ((line) => console.error(line));
		this.clock = options?.clock ?? (() => new Date());
	}

	debug(message: string): void { this.write('debug', message); }
	info(message: string): void { this.write('info', message); }
	warn(message: string): void { this.write('warn', message); }
	error(message: string): void { this.write('error', message); }

	private write(level: LogLevel, message: string): void {
		if (LEVELS[level] < this.threshold) return;
		const line = `${this.clock().toISOString()}: ${message}`;
		if (level === 'warn' || level === 'error') this.err(line);
		else this.out(line);
	}
}
