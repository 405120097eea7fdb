// In-process HttpClient for tests — answers from a handler, never the network.

import {
  HttpClient,
  type HttpClientError,
  type HttpClientRequest,
  HttpClientResponse,
} from "@effect/platform";
import { Effect, Layer } from "effect";

export interface FakeReply {
  readonly status?: number;
  readonly body: string;
}

export type FakeHandler = (
  request: HttpClientRequest.HttpClientRequest,
  url: URL,
) => Effect.Effect<FakeReply, HttpClientError.HttpClientError>;

export function fakeHttpClient(handler: FakeHandler): Layer.Layer<HttpClient.HttpClient> {
  return Layer.succeed(
    HttpClient.HttpClient,
    HttpClient.make((request, url) =>
      handler(request, url).pipe(
        Effect.map((reply) =>
          HttpClientResponse.fromWeb(
            request,
            new Response(reply.body, { status: reply.status ?? 200 }),
          )
        ),
      )
    ),
  );
}

/** The JSON body a request was built with, if any. */
export function requestJson(request: HttpClientRequest.HttpClientRequest): unknown {
  return request.body._tag === "Uint8Array"
    ? JSON.parse(new TextDecoder().decode(request.body.body))
    : undefined;
}
