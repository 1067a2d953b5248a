import http from 'node:http'
import https from 'node:https'
import net from 'node:net'
import tls from 'node:tls'

const original = {
  httpRequest: http.request,
  httpGet: http.get,
  httpsRequest: https.request,
  httpsGet: https.get,
  netConnect: net.connect,
  tlsConnect: tls.connect,
  fetch: typeof globalThis.fetch === 'function' ? globalThis.fetch : undefined,
}

function blockedNetwork(): never {
  throw new Error('Outbound network is disabled for crawler tests')
}

Reflect.set(http, 'request', blockedNetwork)
Reflect.set(http, 'get', blockedNetwork)
Reflect.set(https, 'request', blockedNetwork)
Reflect.set(https, 'get', blockedNetwork)
Reflect.set(net, 'connect', blockedNetwork)
Reflect.set(tls, 'connect', blockedNetwork)
if (original.fetch) {
  globalThis.fetch = async () => blockedNetwork()
}

process.on('exit', () => {
  Reflect.set(http, 'request', original.httpRequest)
  Reflect.set(http, 'get', original.httpGet)
  Reflect.set(https, 'request', original.httpsRequest)
  Reflect.set(https, 'get', original.httpsGet)
  Reflect.set(net, 'connect', original.netConnect)
  Reflect.set(tls, 'connect', original.tlsConnect)
  if (original.fetch) {
    globalThis.fetch = original.fetch
  }
})
