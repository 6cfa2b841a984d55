import { FakeClock } from "@relaycache/clock"
import { createNullLogger } from "@relaycache/logger"
import { describeRemoteStorageContract } from "../../../ports/__tests__/remote-storage.contract"
import { FakeRedisServer } from "../../../tests/utils/fake-redis-server"
import { RedisRemoteStorage } from "../redis-remote-storage"

describe("RedisRemoteStorage (contract)", () => {
  describeRemoteStorageContract("RedisRemoteStorage", () => {
    return new RedisRemoteStorage(
      { connector: new FakeRedisServer(), clock: new FakeClock(), logger: createNullLogger() },
      { url: "redis://cache.internal", connectTimeoutMs: 100, operationTimeoutMs: 10_000 },
    )
  })

  describeRemoteStorageContract("RedisRemoteStorage (authenticated)", () => {
    const server = new FakeRedisServer()
    server.credentials = { username: "builder", password: "test-secret" }

    return new RedisRemoteStorage(
      { connector: server, clock: new FakeClock(), logger: createNullLogger() },
      {
        url: "redis://cache.internal",
        connectTimeoutMs: 100,
        operationTimeoutMs: 10_000,
        username: "builder",
        password: "test-secret",
      },
    )
  })
})
