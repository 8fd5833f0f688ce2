export const SERVICE_NAME = "content-extraction-service";

// npm sets this when the service is started through a package script.
export const SERVICE_VERSION = process.env.npm_package_version ?? "1.0.0";
