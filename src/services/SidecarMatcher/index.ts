export * from "./SidecarMatcher";
export * from "./SidecarMatcherDefault";
export * from "./SidecarName";
