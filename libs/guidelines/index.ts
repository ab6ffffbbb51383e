export * from "./types";
export { GUIDELINE_BUNDLE, GENERIC_ACTION, fallbackActionFor } from "./bundle";
export { StaticGuidelineStore } from "./static";
export { DynamoGuidelineStore, toItem } from "./dynamo";
