export * from "./TimestampSetter";
export * from "./TimestampSetterFs";
