/**
 * Signal Handler Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import {
  SignalHandler,
  setupSignalHandler,
  cleanupSignalHandler,
} from '../signal-handler.js';
import { TransferOrchestrator } from '../../transfer/index.js';
import { MemorySink, MemorySource } from '../../transfer/testing/index.js';
import { defaultConfig } from '../../config.js';

describe('SignalHandler', () => {
  let processOnSpy: MockInstance<typeof process.on>;
  let processOffSpy: MockInstance<typeof process.off>;
  let level: typeof chalk.level;

  beforeEach(() => {
    processOnSpy = vi.spyOn(process, 'on').mockImplementation(() => process);
    processOffSpy = vi.spyOn(process, 'off').mockImplementation(() => process);
    level = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    processOnSpy.mockRestore();
    processOffSpy.mockRestore();
    cleanupSignalHandler();
    chalk.level = level;
  });

  describe('register', () => {
    it('should listen for SIGINT and SIGTERM', () => {
      const handler = new SignalHandler({ controller: new AbortController() });
      handler.register();

      expect(processOnSpy).toHaveBeenCalledWith('SIGINT', handler.handleInterrupt);
      expect(processOnSpy).toHaveBeenCalledWith('SIGTERM', handler.handleInterrupt);
    });
  });

  describe('unregister', () => {
    it('should remove both listeners', () => {
      const handler = new SignalHandler({ controller: new AbortController() });
      handler.register();
      handler.unregister();

      expect(processOffSpy).toHaveBeenCalledWith('SIGINT', handler.handleInterrupt);
      expect(processOffSpy).toHaveBeenCalledWith('SIGTERM', handler.handleInterrupt);
    });
  });

  describe('handleInterrupt', () => {
    it('should abort the transfer on the first interrupt', () => {
      const controller = new AbortController();
      const lines: string[] = [];
      const exit = vi.fn();
      const handler = new SignalHandler({
        controller,
        exportDir: 'metadata_export',
        write: (line) => lines.push(line),
        exit,
      });

      handler.handleInterrupt();

      expect(controller.signal.aborted).toBe(true);
      expect(handler.interrupted).toBe(true);
      expect(exit).not.toHaveBeenCalled();
      expect(lines).toEqual([
        '',
        '  ⏸ Transfer interrupted, stopping after the current request...',
        '  Progress is saved in metadata_export; run the same command again to resume.',
        '  Press Ctrl+C again to force quit.',
      ]);
    });

    it('should report the orchestrator phase', () => {
      const lines: string[] = [];
      const orchestrator = new TransferOrchestrator(defaultConfig(), {
        source: new MemorySource({
          project: { id: 1, name: 'widget', pathWithNamespace: 'acme/widget', webUrl: 'https://gitlab.example.com/acme/widget' },
        }),
        sink: new MemorySink(),
      });
      const handler = new SignalHandler({
        controller: new AbortController(),
        orchestrator,
        write: (line) => lines.push(line),
      });

      handler.handleInterrupt();

      expect(lines).toContain('  Phase: pending');
    });

    it('should force quit on the second interrupt', () => {
      const exit = vi.fn();
      const handler = new SignalHandler({ controller: new AbortController(), write: () => undefined, exit });

      handler.handleInterrupt();
      handler.handleInterrupt();

      expect(exit).toHaveBeenCalledWith(130);
    });
  });

  describe('setupSignalHandler', () => {
    it('should create and register a global handler', () => {
      const handler = setupSignalHandler({ controller: new AbortController() });

      expect(handler).toBeInstanceOf(SignalHandler);
      expect(processOnSpy).toHaveBeenCalledWith('SIGINT', handler.handleInterrupt);
    });

    it('should replace an existing handler', () => {
      const first = setupSignalHandler({ controller: new AbortController() });
      const second = setupSignalHandler({ controller: new AbortController() });

      expect(processOffSpy).toHaveBeenCalledWith('SIGINT', first.handleInterrupt);
      expect(processOffSpy).not.toHaveBeenCalledWith('SIGINT', second.handleInterrupt);
    });
  });

  describe('cleanupSignalHandler', () => {
    it('should unregister the global handler once', () => {
      const handler = setupSignalHandler({ controller: new AbortController() });

      cleanupSignalHandler();
      cleanupSignalHandler();

      expect(processOffSpy).toHaveBeenCalledWith('SIGINT', handler.handleInterrupt);
      expect(processOffSpy).toHaveBeenCalledWith('SIGTERM', handler.handleInterrupt);
      expect(processOffSpy).toHaveBeenCalledTimes(2);
    });
  });
});
