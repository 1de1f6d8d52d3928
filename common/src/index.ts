export * from "./access";
export * from "./platform";
export * from "./tenant";
export * from "./util/LoggerCommon";
export * from "./util/PasswordValidation";
export * from "./util/SubdomainUtils";
