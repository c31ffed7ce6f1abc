import pkg from "../../package.json" with { type: "json" };

/** Version of this CLI, from package.json */
export const CLI_VERSION: string = pkg.version;
