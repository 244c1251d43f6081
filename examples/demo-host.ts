/**
 * Demo host
 *
 * Embeds an ApiServer in a tiny simulated machine, then connects a client
 * over the Unix socket, subscribes to toolhead status and console output,
 * and prints what it receives.
 *
 * Run with: node --import tsx examples/demo-host.ts
 */

import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import { ApiServer, CommandError, decodeFrame, encodeFrame, splitFrames } from '../src/index.ts';
import type { Host, HostEvent, HostState, StartArgs } from '../src/index.ts';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

class Toolhead {
  position = [0, 0, 0, 0];

  getStatus(_eventtime: number) {
    return { position: [...this.position], homed_axes: 'xyz' };
  }
}

class Console {
  private _handlers: Array<(message: string) => void> = [];

  registerOutputHandler(handler: (message: string) => void): void {
    this._handlers.push(handler);
  }

  respond(message: string): void {
    for (const handler of this._handlers) handler(message);
  }
}

class DemoHost implements Host {
  readonly toolhead = new Toolhead();
  readonly console = new Console();
  private _state: HostState = 'startup';
  private _handlers = new Map<HostEvent, Array<() => void>>();
  private _startArgs: StartArgs;

  constructor(socketPath: string) {
    this._startArgs = { apiServer: socketPath, softwareVersion: 'demo-0.1' };
  }

  lookupObjects(): Iterable<[string, unknown]> {
    return [
      ['toolhead', this.toolhead],
      ['gcode', this.console],
    ];
  }

  lookupObject(name: string): unknown {
    if (name === 'toolhead') return this.toolhead;
    if (name === 'gcode') return this.console;
    return undefined;
  }

  getStartArgs(): StartArgs {
    return this._startArgs;
  }

  getStateMessage(): { message: string; state: HostState } {
    return { message: `Host is ${this._state}`, state: this._state };
  }

  invokeShutdown(reason: string): void {
    console.log(`[Host] Shutdown: ${reason}`);
    this._state = 'shutdown';
  }

  registerEventHandler(event: HostEvent, handler: () => void): void {
    const handlers = this._handlers.get(event) ?? [];
    handlers.push(handler);
    this._handlers.set(event, handlers);
  }

  emit(event: HostEvent): void {
    if (event === 'ready') this._state = 'ready';
    for (const handler of this._handlers.get(event) ?? []) handler();
  }
}

async function main() {
  const socketPath = path.join(os.tmpdir(), 'api-server-demo.sock');
  const host = new DemoHost(socketPath);

  // 1. Create the server with one domain endpoint contributed by a plugin
  const server = new ApiServer(host, {
    refreshMs: 250,
    plugins: [
      {
        name: 'motion',
        endpoints: {
          'motion/move': (request) => {
            const x = request.getFloat('x');
            if (x < 0 || x > 200) throw new CommandError('Move out of range');
            host.toolhead.position[0] = x;
            host.console.respond(`// moved to X${x}`);
          },
        },
      },
    ],
  });
  await server.start();
  host.emit('ready');
  console.log(`[Server] Listening on ${socketPath}`);

  // 2. Connect a client and print every frame it receives
  const socket = net.createConnection(socketPath);
  await new Promise<void>((resolve) => socket.once('connect', () => resolve()));
  let pending = Buffer.alloc(0);
  socket.on('data', (chunk: Buffer) => {
    const { frames, rest } = splitFrames(pending, chunk);
    pending = rest;
    for (const frame of frames) {
      console.log(`[Client] ${JSON.stringify(decodeFrame(frame))}`);
    }
  });
  const send = (value: unknown) => socket.write(encodeFrame(value));

  // 3. Subscribe, move, and watch the pushes arrive
  send({ id: 1, method: 'objects/subscription', params: { toolhead: ['position'], response_template: { id: 100 } } });
  send({ id: 2, method: 'subscribe_gcode_output', params: { response_template: { method: 'notify_gcode_response' } } });
  await delay(300);
  send({ id: 3, method: 'motion/move', params: { x: 42 } });
  send({ id: 4, method: 'motion/move', params: { x: 500 } });
  await delay(600);

  // 4. Cleanup
  console.log('Cleaning up...');
  socket.destroy();
  host.emit('disconnect');
  await server.close();
  console.log('Done!');
}

main().catch(console.error);
