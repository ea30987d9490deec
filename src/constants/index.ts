export * from "./logger";
export * from "./uploader";
export * from "./storage";
export * from "./clients/cloudFront";
// Google Sheets constants are imported directly from "@/constants/clients/googleSheets".
