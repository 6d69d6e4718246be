import { WebSocket } from 'ws'
import { ChatError } from '@relaychat/core'
import type { ClientTransport } from './types.js'

/** Wrap a server-side `ws` socket as a {@link ClientTransport}. */
export function wsTransport(ws: WebSocket): ClientTransport {
  return {
    send(data, done) {
      if (ws.readyState !== WebSocket.OPEN) {
        done(new ChatError('TransportClosed', 'Socket is not open'))
        return
      }
      ws.send(data, (err) => done(err))
    },

    close(code, reason) {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close(code, reason)
      }
    },

    onMessage(handler) {
      ws.on('message', (data, isBinary) => {
        // The protocol is text-only; binary frames are ignored.
        if (isBinary) return
        handler(data.toString())
      })
    },

    onClose(handler) {
      ws.on('close', () => handler())
      ws.on('error', () => {
        // 'close' always follows 'error'; the disconnect logic lives there.
      })
    },
  }
}
