export { loadUploaderConfig, envNameForFlag, USAGE } from "./uploaderConfig";
