/**
 * CloudFront client public API
 */

export { CloudFrontInvalidator } from "./cloudFrontInvalidator";
export type { CdnInvalidator, CloudFrontInvalidatorConfig } from "@/types";
