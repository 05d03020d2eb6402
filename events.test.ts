// Copyright 2018-2024 the oak authors. All rights reserved.

import assert from "node:assert/strict";
import { test } from "node:test";

import { EventBus } from "./events.ts";
import { MockRequestEvent } from "./testing_utils.ts";

test("EventBus - listeners are called in registration order", () => {
  const bus = new EventBus();
  const requestEvent = new MockRequestEvent("http://localhost/");
  const calls: string[] = [];
  bus.on("before-routing", () => {
    calls.push("first");
  });
  bus.on("before-routing", (event) => {
    assert.equal(event.requestEvent, requestEvent);
    calls.push("second");
  });
  bus.on("route-not-found", () => {
    calls.push("not found");
  });
  bus.publish("before-routing", { requestEvent });
  assert.deepEqual(calls, ["first", "second"]);
  assert.equal(bus.listenerCount("before-routing"), 2);
  assert.equal(bus.listenerCount("after-routing"), 0);
});

test("EventBus - removed listeners are not called", () => {
  const bus = new EventBus();
  const calls: string[] = [];
  const listener = bus.on("route-not-found", () => {
    calls.push("called");
  });
  listener.remove();
  bus.publish("route-not-found", {
    requestEvent: new MockRequestEvent("http://localhost/"),
  });
  assert.deepEqual(calls, []);
  assert.equal(bus.listenerCount("route-not-found"), 0);
});

test("EventBus - failing listeners do not affect others", async () => {
  const bus = new EventBus();
  const calls: string[] = [];
  bus.on("route-not-found", () => {
    throw new Error("listener failed");
  });
  bus.on("route-not-found", () => Promise.reject(new Error("async failure")));
  bus.on("route-not-found", () => {
    calls.push("third");
  });
  assert.doesNotThrow(() =>
    bus.publish("route-not-found", {
      requestEvent: new MockRequestEvent("http://localhost/"),
    })
  );
  await new Promise((resolve) => setTimeout(resolve, 0));
  assert.deepEqual(calls, ["third"]);
});
