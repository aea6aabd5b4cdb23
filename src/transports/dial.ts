import net from 'net';
import debug from 'debug';
import { DEFAULT_DIAL_TIMEOUT, LOG_NAMESPACE } from '../constants';
import { AbortError, TimeoutError } from '../errors';
import type { Dialer, WhoisConnection, WhoisServer } from '../types';

const log = debug(`${LOG_NAMESPACE}:dial`);

// the error a cancelled operation rejects with: the abort reason when it is an Error
export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new AbortError('Operation was aborted');
}

/**
 * Race a task that cannot itself be cancelled against an abort signal.
 *
 * Whichever settles first decides the outcome. When the signal wins, the
 * returned promise rejects at once with the abort reason and the task is
 * left to finish on its own: a value it produces afterwards is handed to
 * `dispose`, a late failure is only logged.
 */
export function cancelable<T>(
  task: Promise<T>,
  signal: AbortSignal | undefined,
  dispose: (value: T) => void
): Promise<T> {
  if (!signal) return task;

  return new Promise<T>((resolve, reject) => {
    let isSettled = false;

    const onAbort = () => {
      if (isSettled) return;
      isSettled = true;
      reject(abortReason(signal));
    };

    void task.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        if (isSettled) {
          dispose(value);
          return;
        }
        isSettled = true;
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        if (isSettled) {
          log('task failed after cancellation: %O', error);
          return;
        }
        isSettled = true;
        reject(error);
      }
    );

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

// dial a whois server, giving up as soon as the signal aborts
// a connection that completes after the abort is destroyed rather than leaked
export function cancelableDial(
  dialer: Dialer,
  server: WhoisServer,
  signal?: AbortSignal
): Promise<WhoisConnection> {
  const task = Promise.resolve().then(() => dialer.dial(server, signal));
  return cancelable(task, signal, connection => {
    log('closing late connection to %s:%d', server.host, server.port);
    connection.destroy();
  });
}

// direct TCP connections through node's net module
// the connect itself is bounded by its own timeout, not by the query signal
export class NetDialer implements Dialer {
  constructor(private readonly timeout: number = DEFAULT_DIAL_TIMEOUT) {}

  dial(server: WhoisServer): Promise<WhoisConnection> {
    return new Promise<WhoisConnection>((resolve, reject) => {
      const socket = net.connect({ host: server.host, port: server.port });
      socket.setTimeout(this.timeout);

      const onError = (error: Error) => {
        socket.destroy();
        reject(error);
      };

      const onTimeout = () => {
        socket.destroy();
        reject(
          new TimeoutError(
            `Connect to '${server.host}:${server.port}' timed out after ${this.timeout}ms`
          )
        );
      };

      socket.once('error', onError);
      socket.once('timeout', onTimeout);
      socket.once('connect', () => {
        socket.removeListener('error', onError);
        socket.removeListener('timeout', onTimeout);
        socket.setTimeout(0);
        resolve(socket);
      });
    });
  }
}
