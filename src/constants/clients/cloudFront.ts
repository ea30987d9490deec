/**
 * CloudFront client constants
 */

/**
 * Region used for the CloudFront API endpoint
 */
export const CLOUDFRONT_DEFAULT_REGION = "us-east-1";
