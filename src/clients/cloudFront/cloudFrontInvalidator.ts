/**
 * CloudFrontInvalidator: creates CDN cache invalidations
 *
 * Uses the default AWS credential chain (environment, shared credentials
 * file, instance role).
 */

import {
  CloudFrontClient,
  CreateInvalidationCommand,
} from "@aws-sdk/client-cloudfront";
import type {
  CdnInvalidator,
  CloudFrontInvalidatorConfig,
  Logger,
} from "@/types";
import { CLOUDFRONT_DEFAULT_REGION } from "@/constants";
import { InvalidationError, errorMessage } from "@/errors";
import { silentLogger } from "@/logger";

type CloudFrontClientFactory = (region: string) => CloudFrontClient;

const defaultClientFactory: CloudFrontClientFactory = (region) =>
  new CloudFrontClient({ region });

/**
 * A client is created per call and destroyed afterwards.
 */
export class CloudFrontInvalidator implements CdnInvalidator {
  private readonly region: string;
  private readonly logger: Logger;
  private readonly createClient: CloudFrontClientFactory;

  constructor(
    config: CloudFrontInvalidatorConfig = {},
    logger: Logger = silentLogger,
    createClient: CloudFrontClientFactory = defaultClientFactory,
  ) {
    this.region = config.region ?? CLOUDFRONT_DEFAULT_REGION;
    this.logger = logger;
    this.createClient = createClient;
  }

  async invalidate(
    distributionId: string,
    paths: string[],
    callerReference: string,
  ): Promise<string> {
    this.logger.debug("Creating CloudFront invalidation", {
      distributionId,
      callerReference,
      pathCount: paths.length,
    });

    const client = this.createClient(this.region);
    try {
      const result = await client.send(
        new CreateInvalidationCommand({
          DistributionId: distributionId,
          InvalidationBatch: {
            CallerReference: callerReference,
            Paths: {
              Quantity: paths.length,
              Items: paths,
            },
          },
        }),
      );

      const id = result.Invalidation?.Id;
      if (!id) {
        throw new Error("response did not include an invalidation ID");
      }
      return id;
    } catch (error) {
      throw new InvalidationError(
        distributionId,
        `could not invalidate CloudFront distribution ${distributionId}: ${errorMessage(error)}`,
        { cause: error },
      );
    } finally {
      client.destroy();
    }
  }
}
