#!/usr/bin/env node
import { UsageError, parsePublishArgs } from "~/publisher/cli";
import { PublishError } from "~/publisher/errors";
import { createPublisherInjector } from "~/publisher/publisher-injector";
import { Token } from "~/token";

async function run(): Promise<void> {
  const args = parsePublishArgs(process.argv.slice(2));
  const injector = createPublisherInjector();
  const publishService = injector.resolve(Token.PublishService);
  const outcome = await publishService.publish(args.imageRef, args.filesystem, args.rootSubdir);
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(outcome));
}

run().catch((err: unknown) => {
  /* eslint-disable no-console */
  if (err instanceof UsageError) {
    console.error(err.message);
    process.exit(2);
  }
  if (err instanceof PublishError) {
    console.error(JSON.stringify({ error: err.kind, ...err.context, message: err.message }));
  } else {
    console.error(err);
  }
  /* eslint-enable no-console */
  process.exit(1);
});
