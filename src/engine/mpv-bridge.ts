/**
 * mpv Bridge - Process wrapper for the mpv binary
 * Owns at most one running mpv process (an engine session) and its IPC channel
 */

import { spawn, SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import { Readable } from 'stream';
import * as fs from 'fs/promises';
import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { EngineConfig } from '../config/environment';
import { EngineBinaryMissingError, EngineLaunchFailedError, NoActiveSessionError, errorMessage } from '../common/errors';
import { EndOfFilePayload, PauseChangedPayload, ProcessExitedPayload } from '../common/events';
import { MpvEventMessage, MpvIpcClient } from './mpv-ipc-client';
import { EngineCommand, EngineLaunchResult, EngineSessionInfo, LaunchOptions } from './engine.types';

/**
 * The parts of a ChildProcess the bridge relies on
 */
export interface EngineProcess extends EventEmitter {
  readonly pid?: number;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => EngineProcess;

export type MpvBridgeConfig = EngineConfig;

const PAUSE_OBSERVER_ID = 1;

interface EngineSession {
  id: string;
  process: EngineProcess;
  ipc: MpvIpcClient | null;
  mediaPath: string;
  paused: boolean;
  startedAt: number;
  terminating: boolean;
  exited: boolean;
  exitPromise: Promise<void>;
  spawnError: NodeJS.ErrnoException | null;
  stderrTail: string;
  // Aborts the socket poll when the process dies during startup
  startup: AbortController;
}

export class MpvBridge extends EventEmitter {
  private readonly logger = new Logger(MpvBridge.name);
  private session: EngineSession | null = null;

  constructor(
    private readonly config: MpvBridgeConfig,
    private readonly spawnProcess: SpawnFunction = spawn,
  ) {
    super();
    this.logger.log(`Initialized with binary: ${config.binaryPath}`);
  }

  /**
   * Get the binary path
   */
  get path(): string {
    return this.config.binaryPath;
  }

  getSession(): EngineSessionInfo | null {
    const session = this.session;
    if (!session) {
      return null;
    }
    return {
      id: session.id,
      mediaPath: session.mediaPath,
      pid: session.process.pid,
      paused: session.paused,
      ready: session.ipc !== null,
      startedAt: session.startedAt,
    };
  }

  /**
   * Build the mpv command line for a file
   */
  buildArgs(mediaPath: string, options: LaunchOptions = {}): string[] {
    const { fullscreen = true, startPaused = false, loop = false } = options;
    const args = [
      '--idle=yes',
      '--force-window=yes',
      `--input-ipc-server=${this.config.socketPath}`,
      '--image-display-duration=inf',
      '--no-input-default-bindings',
      '--no-osc',
      '--cursor-autohide=always',
      '--hwdec=auto',
      '--no-terminal',
    ];
    if (fullscreen) args.push('--fullscreen=yes');
    if (startPaused) args.push('--pause=yes');
    if (loop) args.push('--loop-file=inf');
    args.push(...this.config.extraArgs);
    // Everything after -- is a file, even names starting with a dash
    args.push('--', mediaPath);
    return args;
  }

  /**
   * Start a new mpv process for a file, replacing any running session
   */
  async launch(mediaPath: string, options: LaunchOptions = {}): Promise<EngineLaunchResult> {
    await this.terminate();
    await fs.rm(this.config.socketPath, { force: true });

    const args = this.buildArgs(mediaPath, options);
    const sessionId = uuidv4();
    this.logger.log(`[${sessionId}] Starting: ${this.config.binaryPath} ${args.join(' ')}`);

    const proc = this.spawnProcess(this.config.binaryPath, args, {
      stdio: ['ignore', 'ignore', 'pipe'],
    });

    let markExited: () => void = () => undefined;
    const session: EngineSession = {
      id: sessionId,
      process: proc,
      ipc: null,
      mediaPath,
      paused: options.startPaused ?? false,
      startedAt: Date.now(),
      terminating: false,
      exited: false,
      exitPromise: new Promise<void>((resolve) => {
        markExited = resolve;
      }),
      spawnError: null,
      stderrTail: '',
      startup: new AbortController(),
    };
    this.session = session;

    proc.stderr?.on('data', (data: Buffer) => {
      session.stderrTail = (session.stderrTail + data.toString()).slice(-500);
    });

    const onExit = (code: number | null, signal: NodeJS.Signals | null) => {
      if (session.exited) {
        return;
      }
      session.exited = true;
      session.startup.abort();
      session.ipc?.close();
      if (this.session === session) {
        this.session = null;
      }
      markExited();

      const expected = session.terminating;
      if (expected) {
        this.logger.log(`[${sessionId}] Exited (code ${code}, signal ${signal})`);
      } else {
        this.logger.error(`[${sessionId}] Exited unexpectedly (code ${code}, signal ${signal})`);
        if (session.stderrTail) {
          this.logger.error(`[${sessionId}] stderr: ${session.stderrTail}`);
        }
      }

      const payload: ProcessExitedPayload = {
        sessionId,
        mediaPath,
        code,
        signal,
        expected,
        synthesized: false,
      };
      this.emit('process-exited', payload);
    };

    proc.on('exit', onExit);
    proc.on('error', (err: NodeJS.ErrnoException) => {
      this.logger.error(`[${sessionId}] Spawn error: ${err.message}`);
      // A process that never started will not emit 'exit'
      if (proc.pid === undefined) {
        session.spawnError = err;
        onExit(null, null);
      }
    });

    try {
      const ipc = await MpvIpcClient.connect(this.config.socketPath, {
        timeoutMs: this.config.startupTimeoutMs,
        pollMs: this.config.socketPollMs,
        requestTimeoutMs: this.config.requestTimeoutMs,
        signal: session.startup.signal,
      });

      if (session.exited) {
        ipc.close();
        throw new Error('engine process exited during startup');
      }

      session.ipc = ipc;
      ipc.on('event', (event: MpvEventMessage) => this.onEngineEvent(session, event));
      await ipc.observeProperty(PAUSE_OBSERVER_ID, 'pause');

      this.logger.log(`[${sessionId}] Control channel ready after ${Date.now() - session.startedAt}ms`);
      return { sessionId, success: true };
    } catch (error) {
      if (session.spawnError?.code === 'ENOENT') {
        throw new EngineBinaryMissingError(this.config.binaryPath);
      }

      const failure = new EngineLaunchFailedError(mediaPath, errorMessage(error));
      this.logger.error(`[${sessionId}] ${failure.message}`);
      await this.abandonFailedSession(session);
      return { sessionId, success: false, error: failure.message };
    }
  }

  /**
   * Send a control request to the running session
   */
  async command(request: EngineCommand): Promise<unknown> {
    const session = this.session;
    if (!session || !session.ipc) {
      throw new NoActiveSessionError(request.name);
    }
    return session.ipc.request(this.toMpvCommand(request));
  }

  /**
   * Stop the running session: ask mpv to quit, kill it if it ignores us.
   * Safe to call when nothing is running.
   */
  async terminate(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;
    session.terminating = true;
    session.startup.abort();

    try {
      if (session.exited) {
        return;
      }

      if (session.ipc?.isOpen) {
        try {
          await session.ipc.request(['quit']);
        } catch (error) {
          this.logger.debug(`[${session.id}] quit request failed: ${errorMessage(error)}`);
        }
      } else {
        session.process.kill('SIGTERM');
      }

      if (!(await this.waitForExit(session, this.config.killGraceMs))) {
        this.logger.warn(`[${session.id}] Did not exit within ${this.config.killGraceMs}ms, killing`);
        session.process.kill('SIGKILL');
        await this.waitForExit(session, this.config.killGraceMs);
      }
    } finally {
      session.ipc?.close();
      session.ipc = null;
    }
  }

  private async abandonFailedSession(session: EngineSession): Promise<void> {
    const alreadyExited = session.exited;
    if (this.session === session) {
      this.session = null;
    }
    session.terminating = true;
    session.ipc?.close();
    session.ipc = null;

    if (!alreadyExited) {
      session.process.kill('SIGKILL');
      await this.waitForExit(session, this.config.killGraceMs);

      // The real exit was expected (we killed it); report the failure as a crash
      const payload: ProcessExitedPayload = {
        sessionId: session.id,
        mediaPath: session.mediaPath,
        code: null,
        signal: null,
        expected: false,
        synthesized: true,
      };
      this.emit('process-exited', payload);
    }
  }

  private waitForExit(session: EngineSession, timeoutMs: number): Promise<boolean> {
    if (session.exited) {
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void session.exitPromise.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  private onEngineEvent(session: EngineSession, event: MpvEventMessage): void {
    if (event.event === 'end-file' && event.reason === 'eof') {
      const payload: EndOfFilePayload = { sessionId: session.id, mediaPath: session.mediaPath };
      this.emit('end-of-file', payload);
      return;
    }

    if (event.event === 'property-change' && event.name === 'pause' && typeof event.data === 'boolean') {
      if (session.paused === event.data) {
        return;
      }
      session.paused = event.data;
      const payload: PauseChangedPayload = { sessionId: session.id, paused: event.data };
      this.emit('pause-changed', payload);
    }
  }

  private toMpvCommand(request: EngineCommand): unknown[] {
    switch (request.name) {
      case 'load':
        return ['loadfile', request.path, 'replace'];
      case 'pause':
        return ['cycle', 'pause'];
      case 'stop':
        return ['stop'];
      case 'volume':
        return ['add', 'volume', request.delta];
      case 'mute':
        return ['cycle', 'mute'];
      case 'seek':
        return ['seek', request.seconds, 'relative'];
      case 'quit':
        return ['quit'];
    }
  }
}
