import http from "http";

import * as SocksAdapter from "./../src";

// Expects a SOCKS5 server on localhost:9050, e.g. a local Tor client.
const server = new SocksAdapter.Server({
    listen: "127.0.0.1:8000",
    socks: "127.0.0.1:9050",
});

server.on("connectionClosed", ({ connectionId, stats }: SocksAdapter.ConnectionClosedData) => {
    console.log(`Connection ${connectionId} closed`, stats);
});

server.on("requestFailed", ({ connectionId, error }: SocksAdapter.RequestFailedData) => {
    console.log(`Connection ${connectionId} failed: ${String(error)}`);
});

server.listen().then(() => {
    console.log(`Proxy server is listening on port ${server.port}`);

    // Absolute-form request, as any HTTP client configured with a proxy sends it.
    const request = http.request({
        host: "127.0.0.1",
        port: server.port,
        method: "GET",
        path: "http://example.com/",
        headers: { Host: "example.com" },
    }, (response) => {
        console.log(`Response status: ${response.statusCode}`);
        response.resume();
        response.on("end", () => {
            server.close(true).catch((error: unknown) => console.error(error));
        });
    });

    request.on("error", (error) => console.error(error));
    request.end();
}, (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
