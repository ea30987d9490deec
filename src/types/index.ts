export * from "./logger";
export * from "./document";
export * from "./storage";
export * from "./pipeline";
export * from "./config";
export * from "./clients/cloudFront";
// Google Sheets API payload types stay out of the global barrel;
// import them from "@/clients/googleSheets" or "@/types/clients/googleSheets".
