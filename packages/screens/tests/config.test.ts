import { afterEach, describe, it, expect, vi } from "vitest";
import { ConfigError, silentLogger } from "@trending/bloc";
import {
  RepositoryBloc,
  createInMemoryFetcher,
  idleState,
  loadFilterConfig,
  loadPagingConfig,
  loadRepositoryConfig,
} from "../src/index.js";
import { createScriptedFetcher } from "./helpers.js";

describe("loadRepositoryConfig", () => {
  it("applies defaults", () => {
    expect(loadRepositoryConfig({})).toEqual({
      resetFilterOnFetch: true,
      pageSize: 20,
    });
  });

  it("reads overrides", () => {
    expect(
      loadRepositoryConfig({
        REPOSITORY_RESET_FILTER_ON_FETCH: "false",
        REPOSITORY_PAGE_SIZE: "5",
      }),
    ).toEqual({ resetFilterOnFetch: false, pageSize: 5 });
  });

  it("rejects a non-positive page size", () => {
    expect(() => loadRepositoryConfig({ REPOSITORY_PAGE_SIZE: "0" })).toThrow(
      ConfigError,
    );
  });

  it("rejects a non-boolean filter flag", () => {
    expect(() =>
      loadRepositoryConfig({ REPOSITORY_RESET_FILTER_ON_FETCH: "yes" }),
    ).toThrow(ConfigError);
  });
});

describe("loadFilterConfig and loadPagingConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads only their own variables", () => {
    expect(
      loadFilterConfig({
        REPOSITORY_RESET_FILTER_ON_FETCH: "false",
        REPOSITORY_PAGE_SIZE: "0",
      }),
    ).toEqual({ resetFilterOnFetch: false });
    expect(
      loadPagingConfig({
        REPOSITORY_RESET_FILTER_ON_FETCH: "yes",
        REPOSITORY_PAGE_SIZE: "5",
      }),
    ).toEqual({ pageSize: 5 });
  });

  it("builds a RepositoryBloc despite an invalid page size", () => {
    vi.stubEnv("REPOSITORY_PAGE_SIZE", "0");
    const { fetcher } = createScriptedFetcher([]);

    const bloc = new RepositoryBloc({ fetcher, logger: silentLogger });

    expect(bloc.state).toEqual(idleState());
    expect(() => createInMemoryFetcher([])).toThrow(ConfigError);
  });
});
