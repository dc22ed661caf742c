import type { Router } from 'express';

export function createRequest(overrides: Record<string, any> = {}): any {
  const headers: Record<string, string> = { ...(overrides.headers ?? {}) };
  return {
    user: { uid: 'user-1' },
    params: {},
    body: {},
    query: {},
    ip: '127.0.0.1',
    method: 'GET',
    path: '/',
    ...overrides,
    headers,
    header(name: string) {
      return headers[name.toLowerCase()];
    },
    get(name: string) {
      return headers[name.toLowerCase()];
    },
  };
}

export function createResponse(): any {
  return {
    statusCode: 200,
    body: undefined as unknown,
    headers: {} as Record<string, string>,
    headersSent: false,
    status(code: number) {
      this.statusCode = code;
      return this;
    },
    set(key: string, value: string) {
      this.headers[key] = value;
      return this;
    },
    json(payload: unknown) {
      this.body = payload;
      this.headersSent = true;
      return this;
    },
  };
}

/** Last handler of a route, skipping the auth and rate-limit middleware in front of it. */
export function getRouteHandler(router: Router, method: 'get' | 'post', path: string) {
  const layer = router.stack.find(
    (stackLayer: any) => stackLayer.route?.path === path && stackLayer.route?.methods?.[method],
  );
  if (!layer) {
    throw new Error(`Route not found: ${method.toUpperCase()} ${path}`);
  }
  return layer.route.stack[layer.route.stack.length - 1].handle;
}
