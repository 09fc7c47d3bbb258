// In-process stand-ins for the quote page: a sample page and an HttpClient
// that records each request and answers with a web Response.

import {
  HttpClient,
  type HttpClientRequest,
  HttpClientResponse,
} from "@effect/platform";
import { Effect, Layer } from "effect";

export interface SeenRequest {
  readonly request: HttpClientRequest.HttpClientRequest;
  readonly url: URL;
}

export function fakeHttpClient(
  seen: SeenRequest[],
  reply: (request: HttpClientRequest.HttpClientRequest) => Effect.Effect<Response>,
): Layer.Layer<HttpClient.HttpClient> {
  return Layer.succeed(
    HttpClient.HttpClient,
    HttpClient.make((request, url) => {
      seen.push({ request, url });
      return reply(request).pipe(
        Effect.map((response) => HttpClientResponse.fromWeb(request, response)),
      );
    }),
  );
}

export const pageOk = (html: string) => () =>
  Effect.succeed(new Response(html, { status: 200 }));

// A falling session: every field carries the clr-gr class.
export const fallingPage = `<!DOCTYPE html>
<html><head><title>FTSE Taiwan</title></head><body>
<div class="info">
  <ul class="priceinfo">
    <li><span id="Price1_lbTPrice"><span class="clr-gr">1,688.13</span></span></li>
    <li><span id="Price1_lbTChange"><span class="clr-gr">▼17.42</span></span></li>
    <li><span id="Price1_lbTPercent"><span class="clr-gr">1.02%</span></span></li>
  </ul>
</div>
</body></html>`;
