/**
 * Transport layer exports.
 */

export type { StreamSocket, ListenSocket, ListenSocketFactory } from './StreamSocket.ts';

export { NetStreamSocket, NetListenSocket, bindUnixSocket } from './UnixSocketTransport.ts';
