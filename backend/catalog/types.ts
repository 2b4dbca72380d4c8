export type VolumeType = "named" | "bind" | "file";

export interface NamedVolume {
    type: "named";
    name: string;
    /** Mount point inside the container. */
    path: string;
    readonly: boolean;
}

export interface HostVolume {
    type: "bind" | "file";
    /** Host path as written in the catalog; relative paths resolve against the project root. */
    host: string;
    path: string;
    readonly: boolean;
}

export type Volume = NamedVolume | HostVolume;

export type Hook =
    | { kind: "inline"; script: string }
    | { kind: "file"; path: string }
    | { kind: "none" };

export type HookPoint = "post_start" | "pre_stop";

export interface ImageHooks {
    postStart: Hook;
    preStop: Hook;
}

export interface ImageDefinition {
    readonly name: string;
    readonly image: string;
    readonly category: string;
    readonly description: string;
    readonly shell: string;
    readonly keepAliveCmd: string;
    readonly privileged: boolean;
    readonly volumes: readonly Volume[];
    readonly ports: readonly string[];
    readonly environment: Readonly<Record<string, string>>;
    readonly hooks: Readonly<ImageHooks>;
    readonly motd?: string;
    /** Extra compose service keys passed through verbatim. */
    readonly composeParams: Readonly<Record<string, unknown>>;
    /** Name of the last source that contributed to this image. */
    readonly source: string;
}

export interface Group {
    readonly name: string;
    readonly description: string;
    readonly containers: readonly string[];
    readonly source: string;
}

export interface EffectiveCatalog {
    readonly images: ReadonlyMap<string, ImageDefinition>;
    readonly groups: ReadonlyMap<string, Group>;
    /** Source names in the order they were applied. */
    readonly sources: readonly string[];
    readonly warnings: readonly string[];
}

export interface CatalogSource {
    /** Display name, usually the file name. */
    name: string;
    content: string;
}

export interface CatalogPaths {
    baseCatalog: string;
    overlayDirs: readonly string[];
    scriptsDir?: string;
}
