import fs from "fs/promises";
import { tmpdir } from "os";
import path from "path";

import { v4 as uuidv4 } from "uuid";
import winston from "winston";

import { FakeImageBuilder, FakeImageResolver, FakeTransactionBackend } from "./fakes";

import type { Config, ConfigOverrides } from "~/config";
import { config as defaultConfig } from "~/config";
import type {
  PublisherInjector,
  PublisherProviderOverrides,
} from "~/publisher/publisher-injector";
import { Token } from "~/token";

export interface TestContext {
  injector: PublisherInjector;
  runId: string;
  /** Scratch directory removed after the test. `cvmfsRoot` and `spoolRoot` live inside it. */
  tmpDir: string;
  cvmfsRoot: string;
  spoolRoot: string;
  backend: FakeTransactionBackend;
  builder: FakeImageBuilder;
  resolver: FakeImageResolver;
}

/**
 * Gives every test its own injector, run id and scratch directory, with the external
 * collaborators replaced by in-process fakes.
 */
export class TestEnvironmentBuilder {
  constructor(
    private readonly injectorCtor: (overrides?: PublisherProviderOverrides) => PublisherInjector,
    private readonly configOverrides: ConfigOverrides = {},
    private readonly testLogLevel: string | undefined = void 0,
    private readonly injectorOverrides: PublisherProviderOverrides = {},
  ) {}

  withConfig(overrides: ConfigOverrides): TestEnvironmentBuilder {
    return new TestEnvironmentBuilder(
      this.injectorCtor,
      {
        ...this.configOverrides,
        ...overrides,
        publisher: { ...this.configOverrides.publisher, ...overrides.publisher },
      },
      this.testLogLevel,
      this.injectorOverrides,
    );
  }

  /** Prints logs to the console instead of discarding them. */
  withTestLogging(logLevel = "debug"): TestEnvironmentBuilder {
    return new TestEnvironmentBuilder(
      this.injectorCtor,
      this.configOverrides,
      logLevel,
      this.injectorOverrides,
    );
  }

  withInjectorOverrides(overrides: PublisherProviderOverrides): TestEnvironmentBuilder {
    return new TestEnvironmentBuilder(this.injectorCtor, this.configOverrides, this.testLogLevel, {
      ...this.injectorOverrides,
      ...overrides,
    });
  }

  run(testFn: (ctx: TestContext) => Promise<void>): () => Promise<void> {
    return async () => {
      const runId = uuidv4();
      const tmpDir = await fs.mkdtemp(path.join(tmpdir(), "publisher-test-"));
      const cvmfsRoot = path.join(tmpDir, "cvmfs");
      const spoolRoot = path.join(tmpDir, "spool");
      try {
        const config: Config = {
          ...defaultConfig,
          logLevel: () => this.testLogLevel ?? this.configOverrides.logLevel ?? "debug",
          publisher: () => ({
            ...defaultConfig.publisher(),
            cvmfsRoot,
            spoolRoot,
            ...this.configOverrides.publisher,
          }),
        };
        const logger = winston.createLogger({
          level: config.logLevel(),
          silent: this.testLogLevel === void 0,
          defaultMeta: { runId },
          format: winston.format.combine(winston.format.timestamp(), winston.format.simple()),
          transports: [new winston.transports.Console()],
        });
        const backend = new FakeTransactionBackend();
        const builder = new FakeImageBuilder();
        const resolver = new FakeImageResolver();
        const injector = this.injectorCtor({
          [Token.Config]: { provide: { value: config } },
          [Token.Logger]: { provide: { value: logger } },
          [Token.TransactionBackend]: { provide: { value: backend } },
          [Token.ImageBuilder]: { provide: { value: builder } },
          [Token.ImageResolver]: { provide: { value: resolver } },
          ...this.injectorOverrides,
        });
        await testFn({ injector, runId, tmpDir, cvmfsRoot, spoolRoot, backend, builder, resolver });
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error(`Test failed with runId: ${runId}`);
        throw err;
      } finally {
        await fs.rm(tmpDir, { recursive: true, force: true });
      }
    };
  }
}
