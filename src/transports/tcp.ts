import debug from 'debug';
import { LOG_NAMESPACE, MAX_RESPONSE_SIZE } from '../constants';
import { AbortError, ConnectError, ReadError, SendError, TimeoutError, WhoisError } from '../errors';
import type {
  WhoisConnection,
  WhoisQuestion,
  WhoisTransportOptions,
  WhoisTransportQuery,
} from '../types';
import { abortReason, cancelableDial } from './dial';

const log = debug(`${LOG_NAMESPACE}:tcp`);

// run one raw whois exchange: dial, send the query line, read until the server closes
export const tcpQuery: WhoisTransportQuery = async function (
  question: WhoisQuestion,
  options: WhoisTransportOptions
): Promise<string> {
  const { host, port } = question.server;

  // check if external signal is already aborted
  if (options.signal?.aborted) {
    throw new AbortError('Query was aborted');
  }

  // one deadline covers the dial, the write and the read
  const controller = new AbortController();
  const onExternalAbort = () => controller.abort(new AbortError('Query was aborted'));
  options.signal?.addEventListener('abort', onExternalAbort, { once: true });
  const timeoutId = setTimeout(() => {
    controller.abort(
      new TimeoutError(
        `Timeout for query '${question.query}' at '${host}:${port}' after ${options.timeout}ms`
      )
    );
  }, options.timeout);

  try {
    log('dialing %s:%d', host, port);
    let socket: WhoisConnection;
    try {
      socket = await cancelableDial(options.dialer, question.server, controller.signal);
    } catch (error) {
      // timeouts and aborts keep their own type
      if (error instanceof WhoisError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectError(`Connect to whois server (${host}) failed: ${message}`, host);
    }
    return await exchange(socket, question, controller.signal);
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener('abort', onExternalAbort);
  }
};

// write the query line and collect the response until the peer closes the connection
function exchange(
  socket: WhoisConnection,
  question: WhoisQuestion,
  signal: AbortSignal
): Promise<string> {
  const { host } = question.server;

  return new Promise<string>((resolve, reject) => {
    let isResolved = false;
    let isSent = false;
    let size = 0;
    const chunks: Buffer[] = [];

    const onAbort = () => safeReject(abortReason(signal));

    // helper to safely settle once and release the socket
    const finish = () => {
      isResolved = true;
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
    };

    const safeResolve = (response: string) => {
      if (isResolved) return;
      finish();
      resolve(response);
    };

    const safeReject = (error: Error) => {
      if (isResolved) return;
      finish();
      reject(error);
    };

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });

    socket.on('data', (data: Buffer | string) => {
      if (isResolved) return;
      const chunk = typeof data === 'string' ? Buffer.from(data) : data;
      size += chunk.length;

      // check if response exceeds maximum size to prevent memory exhaustion
      if (size > MAX_RESPONSE_SIZE) {
        safeReject(
          new ReadError(`Response from whois server (${host}) exceeds ${MAX_RESPONSE_SIZE} bytes`, host)
        );
        return;
      }
      chunks.push(chunk);
    });

    // the server signals the end of the response by closing the connection
    socket.on('end', () => {
      const response = Buffer.concat(chunks).toString('utf-8');
      log('received %d bytes from %s', size, host);
      safeResolve(response);
    });

    socket.on('error', (error: Error) => {
      if (isSent) {
        safeReject(new ReadError(`Read from whois server (${host}) failed: ${error.message}`, host));
      } else {
        safeReject(new SendError(`Send to whois server (${host}) failed: ${error.message}`, host));
      }
    });

    socket.on('close', () => {
      safeReject(new ReadError(`Connection to whois server (${host}) closed unexpectedly`, host));
    });

    // proxied sockets can be handed over paused
    socket.resume();

    socket.write(`${question.query}\r\n`, (error?: Error | null) => {
      if (error) {
        safeReject(new SendError(`Send to whois server (${host}) failed: ${error.message}`, host));
        return;
      }
      isSent = true;
    });
  });
}
