import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import pino from 'pino';
import { buildLoggerOptions, createComponentLogger, createSilentLogger } from '../index.js';

function capture(): { stream: Writable; lines: () => Array<Record<string, unknown>> } {
	const chunks: string[] = [];
	const stream = new Writable({
		write(chunk: Buffer, _encoding, callback) {
			chunks.push(chunk.toString());
			callback();
		},
	});
	return {
		stream,
		lines: () =>
			chunks
				.join('')
				.split('\n')
				.filter((line) => line !== '')
				.map((line): Record<string, unknown> => JSON.parse(line)),
	};
}

describe('buildLoggerOptions', () => {
	it('should label levels and tag the service', () => {
		const sink = capture();
		const logger = pino(buildLoggerOptions({ level: 'info', serviceName: 'auth-server' }), sink.stream);

		logger.info('started');

		const [line] = sink.lines();
		expect(line?.['level']).toBe('info');
		expect(line?.['service']).toBe('auth-server');
		expect(line?.['msg']).toBe('started');
	});

	it('should redact secrets', () => {
		const sink = capture();
		const logger = pino(buildLoggerOptions({ level: 'info', serviceName: 'auth-server' }), sink.stream);

		logger.info({ body: { refreshToken: 'test-refresh', email: 'u@example.com' } }, 'refresh');

		const [line] = sink.lines();
		expect(line?.['body']).toEqual({ refreshToken: '[redacted]', email: 'u@example.com' });
	});

	it('should configure pino-pretty when requested', () => {
		const options = buildLoggerOptions({ level: 'debug', serviceName: 'auth-server', pretty: true });
		expect(options.transport).toEqual({
			target: 'pino-pretty',
			options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
		});
	});
});

describe('createComponentLogger', () => {
	it('should bind the component name', () => {
		const sink = capture();
		const parent = pino(buildLoggerOptions({ level: 'info', serviceName: 'auth-server' }), sink.stream);

		createComponentLogger(parent, 'permission-cache').warn('rebuild failed');

		expect(sink.lines()[0]?.['component']).toBe('permission-cache');
	});

	it('should create a silent logger', () => {
		expect(createSilentLogger().level).toBe('silent');
	});
});
