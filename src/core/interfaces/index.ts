export type Variables = Readonly<Record<string, unknown>>;

export type Handler<Req, Res> = (request: Req) => Res | Promise<Res>;

export * from './model-client.types.js';
