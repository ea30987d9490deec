/**
 * CDN invalidation type definitions
 */

export interface CdnInvalidator {
  /**
   * Create one invalidation covering all paths
   *
   * @returns Invalidation ID reported by the CDN
   */
  invalidate(
    distributionId: string,
    paths: string[],
    callerReference: string,
  ): Promise<string>;
}

export type CloudFrontInvalidatorConfig = {
  /** AWS region for the CloudFront API (CloudFront is global; us-east-1 works) */
  region?: string;
};
