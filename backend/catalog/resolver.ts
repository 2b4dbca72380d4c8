import fs from "fs";
import path from "path";
import YAML from "yaml";
import { log } from "../log.js";
import { extractComposeParams } from "./compose-params.js";
import {
    CatalogPaths,
    CatalogSource,
    EffectiveCatalog,
    Group,
    Hook,
    HookPoint,
    ImageDefinition,
    Volume,
} from "./types.js";

type RawBlock = Record<string, unknown>;

export interface ResolveOptions {
    /** Enables conventional default hook scripts (`stacks/<image>/init.sh`, `init/<image>.sh`, ...). */
    scriptsDir?: string;
}

export class ConfigError extends Error {
    constructor(message: string, readonly source?: string) {
        super(message);
        this.name = "ConfigError";
    }
}

/** A source that does not parse, or has no `images` map. */
export class InvalidSource extends ConfigError {
    constructor(source: string, reason: string) {
        super(`Invalid catalog source ${source}: ${reason}`, source);
        this.name = "InvalidSource";
    }
}

/** A merged image block that cannot become an ImageDefinition. */
export class InvalidImage extends ConfigError {
    constructor(readonly imageName: string, reason: string, source?: string) {
        super(`Invalid image "${imageName}": ${reason}`, source);
        this.name = "InvalidImage";
    }
}

export const IMAGE_DEFAULTS = {
    category: "uncategorized",
    description: "",
    shell: "/bin/bash",
    keepAliveCmd: "sleep infinity",
    privileged: false,
} as const;

function isPlainObject(value: unknown): value is RawBlock {
    return value !== null && typeof value === "object" && !Array.isArray(value);
}

function cloneValue(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(cloneValue);
    }
    if (isPlainObject(value)) {
        return Object.fromEntries(Object.entries(value).map(([ k, v ]) => [ k, cloneValue(v) ]));
    }
    return value;
}

/**
 * Field-level merge: maps merge key by key, everything else (lists included) is replaced.
 */
export function mergeBlocks(base: RawBlock, overlay: RawBlock): RawBlock {
    const result: RawBlock = { ...base };
    for (const [ key, value ] of Object.entries(overlay)) {
        const current = result[key];
        if (isPlainObject(current) && isPlainObject(value)) {
            result[key] = mergeBlocks(current, value);
        } else {
            result[key] = cloneValue(value);
        }
    }
    return result;
}

function parseSource(source: CatalogSource): RawBlock {
    let doc: unknown;
    try {
        doc = YAML.parse(source.content);
    } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new InvalidSource(source.name, `YAML parse error: ${msg}`);
    }

    if (!isPlainObject(doc)) {
        throw new InvalidSource(source.name, "not a mapping");
    }
    if (!isPlainObject(doc.images)) {
        throw new InvalidSource(source.name, "missing \"images\" map");
    }
    return doc;
}

function readGroup(raw: unknown, fallbackName: string | undefined, source: string): Group | null {
    if (!isPlainObject(raw)) {
        return null;
    }
    const name = typeof raw.name === "string" && raw.name ? raw.name : fallbackName;
    if (!name) {
        return null;
    }
    const containers = Array.isArray(raw.containers) ? raw.containers.map(String) : [];
    return {
        name,
        description: typeof raw.description === "string" ? raw.description : "",
        containers,
        source,
    };
}

function collectGroups(doc: RawBlock, source: string): Group[] {
    const groups: Group[] = [];

    const single = readGroup(doc.group, undefined, source);
    if (single) {
        groups.push(single);
    }

    if (Array.isArray(doc.groups)) {
        for (const item of doc.groups) {
            const group = readGroup(item, undefined, source);
            if (group) {
                groups.push(group);
            }
        }
    } else if (isPlainObject(doc.groups)) {
        for (const [ name, item ] of Object.entries(doc.groups)) {
            const group = readGroup(item, name, source);
            if (group) {
                groups.push(group);
            }
        }
    }

    return groups;
}

function readString(block: RawBlock, key: string, fallback: string): string {
    const value = block[key];
    if (value === undefined || value === null) {
        return fallback;
    }
    return String(value);
}

function normalizeEnvironment(env: unknown): Record<string, string> {
    const result: Record<string, string> = {};
    if (Array.isArray(env)) {
        for (const item of env) {
            const str = String(item);
            const eqIdx = str.indexOf("=");
            if (eqIdx === -1) {
                result[str] = "";
            } else {
                result[str.substring(0, eqIdx)] = str.substring(eqIdx + 1);
            }
        }
    } else if (isPlainObject(env)) {
        for (const [ k, v ] of Object.entries(env)) {
            result[k] = v == null ? "" : String(v);
        }
    }
    return result;
}

function readVolumes(imageName: string, raw: unknown, source: string): Volume[] {
    if (raw === undefined || raw === null) {
        return [];
    }
    if (!Array.isArray(raw)) {
        throw new InvalidImage(imageName, "volumes must be a list", source);
    }

    return raw.map((item, index): Volume => {
        if (!isPlainObject(item)) {
            throw new InvalidImage(imageName, `volumes[${index}] is not a mapping`, source);
        }
        const type = item.type ?? "named";
        const containerPath = typeof item.path === "string" ? item.path : "";
        const readOnly = item.readonly === true;
        if (!containerPath) {
            throw new InvalidImage(imageName, `volumes[${index}] requires "path"`, source);
        }

        if (type === "named") {
            if (typeof item.name !== "string" || !item.name) {
                throw new InvalidImage(imageName, `volumes[${index}]: named volume requires "name"`, source);
            }
            return { type,
                name: item.name,
                path: containerPath,
                readonly: readOnly };
        }
        if (type === "bind" || type === "file") {
            if (typeof item.host !== "string" || !item.host) {
                throw new InvalidImage(imageName, `volumes[${index}]: ${type} volume requires "host"`, source);
            }
            return { type,
                host: item.host,
                path: containerPath,
                readonly: readOnly };
        }
        throw new InvalidImage(imageName, `volumes[${index}]: unknown volume type "${String(type)}"`, source);
    });
}

function readHook(imageName: string, point: HookPoint, raw: unknown, source: string): Hook {
    if (raw === undefined || raw === null) {
        return { kind: "none" };
    }
    if (typeof raw === "string") {
        const relative = raw.trim();
        return relative ? { kind: "file",
            path: relative } : { kind: "none" };
    }
    if (isPlainObject(raw) && typeof raw.inline === "string") {
        return { kind: "inline",
            script: raw.inline };
    }
    throw new InvalidImage(imageName, `scripts.${point} must be a file path or {inline: ...}`, source);
}

function defaultHook(imageName: string, point: HookPoint, scriptsDir: string | undefined): Hook {
    if (!scriptsDir) {
        return { kind: "none" };
    }
    const scriptType = point === "post_start" ? "init" : "halt";
    const candidates = [
        path.join("stacks", imageName, `${scriptType}.sh`),
        path.join(scriptType, `${imageName}.sh`),
    ];
    for (const candidate of candidates) {
        if (fs.existsSync(path.join(scriptsDir, candidate))) {
            return { kind: "file",
                path: candidate };
        }
    }
    return { kind: "none" };
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === "object") {
        for (const nested of Object.values(value)) {
            deepFreeze(nested);
        }
        Object.freeze(value);
    }
    return value;
}

function buildDefinition(name: string, block: RawBlock, source: string, options: ResolveOptions, warnings: string[]): ImageDefinition {
    if (typeof block.image !== "string" || block.image.trim() === "") {
        throw new InvalidImage(name, "missing \"image\" reference", source);
    }

    const scripts = isPlainObject(block.scripts) ? block.scripts : {};
    const configuredPostStart = readHook(name, "post_start", scripts.post_start, source);
    const configuredPreStop = readHook(name, "pre_stop", scripts.pre_stop, source);

    const { params, warnings: paramWarnings } = extractComposeParams(name, block);
    warnings.push(...paramWarnings);

    const ports = block.ports === undefined || block.ports === null ? [] : block.ports;
    if (!Array.isArray(ports)) {
        throw new InvalidImage(name, "ports must be a list", source);
    }

    const definition: ImageDefinition = {
        name,
        image: block.image.trim(),
        category: readString(block, "category", IMAGE_DEFAULTS.category),
        description: readString(block, "description", IMAGE_DEFAULTS.description),
        shell: readString(block, "shell", IMAGE_DEFAULTS.shell),
        keepAliveCmd: readString(block, "keep_alive_cmd", IMAGE_DEFAULTS.keepAliveCmd),
        privileged: block.privileged === true,
        volumes: readVolumes(name, block.volumes, source),
        ports: ports.map(String),
        environment: normalizeEnvironment(block.environment),
        hooks: {
            postStart: configuredPostStart.kind === "none" ? defaultHook(name, "post_start", options.scriptsDir) : configuredPostStart,
            preStop: configuredPreStop.kind === "none" ? defaultHook(name, "pre_stop", options.scriptsDir) : configuredPreStop,
        },
        composeParams: params,
        source,
    };

    if (typeof block.motd === "string" && block.motd.length > 0) {
        return { ...definition,
            motd: block.motd };
    }
    return definition;
}

/**
 * Merges the base source and the overlays, in order, into one catalog.
 * Throws ConfigError; never returns a partial catalog.
 */
export function resolve(base: CatalogSource, overlays: readonly CatalogSource[] = [], options: ResolveOptions = {}): EffectiveCatalog {
    const blocks = new Map<string, { block: RawBlock; source: string }>();
    const groups = new Map<string, Group>();
    const sources = [ base, ...overlays ];

    for (const source of sources) {
        const doc = parseSource(source);
        const images = doc.images;
        if (!isPlainObject(images)) {
            throw new InvalidSource(source.name, "missing \"images\" map");
        }

        for (const [ name, rawBlock ] of Object.entries(images)) {
            if (!isPlainObject(rawBlock)) {
                throw new InvalidSource(source.name, `images.${name} is not a mapping`);
            }
            const existing = blocks.get(name);
            const { replace, ...block } = rawBlock;
            if (!existing || replace === true) {
                blocks.set(name, { block: mergeBlocks({}, block),
                    source: source.name });
            } else {
                blocks.set(name, { block: mergeBlocks(existing.block, block),
                    source: source.name });
            }
        }

        for (const group of collectGroups(doc, source.name)) {
            groups.set(group.name, group);
        }
    }

    const warnings: string[] = [];
    const names = [ ...blocks.keys() ].sort((a, b) => {
        const byLower = a.toLowerCase().localeCompare(b.toLowerCase());
        return byLower !== 0 ? byLower : a.localeCompare(b);
    });

    const images = new Map<string, ImageDefinition>();
    for (const name of names) {
        const entry = blocks.get(name);
        if (entry) {
            images.set(name, deepFreeze(buildDefinition(name, entry.block, entry.source, options, warnings)));
        }
    }

    for (const group of groups.values()) {
        deepFreeze(group);
    }

    return {
        images,
        groups,
        sources: sources.map((source) => source.name),
        warnings,
    };
}

function listOverlayFiles(dir: string): string[] {
    if (!fs.existsSync(dir)) {
        return [];
    }
    return fs.readdirSync(dir)
        .filter((file) => file.endsWith(".yml") || file.endsWith(".yaml"))
        .sort()
        .map((file) => path.join(dir, file));
}

function readSource(file: string, name: string): CatalogSource {
    try {
        return { name,
            content: fs.readFileSync(file, "utf-8") };
    } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new InvalidSource(name, `cannot read ${file}: ${msg}`);
    }
}

/**
 * Reads the base catalog and every overlay file from disk, then resolves them.
 */
export function loadCatalog(paths: CatalogPaths): EffectiveCatalog {
    const base = readSource(paths.baseCatalog, path.basename(paths.baseCatalog));
    const overlays = paths.overlayDirs.flatMap((dir) =>
        listOverlayFiles(dir).map((file) => readSource(file, `${path.basename(dir)}/${path.basename(file)}`))
    );

    const catalog = resolve(base, overlays, { scriptsDir: paths.scriptsDir });
    for (const warning of catalog.warnings) {
        log.warn("catalog", warning);
    }
    log.info("catalog", `Catalog loaded: ${catalog.images.size} images, ${catalog.groups.size} groups from ${catalog.sources.length} files`);
    return catalog;
}

export function getImage(catalog: EffectiveCatalog, imageName: string): ImageDefinition | undefined {
    return catalog.images.get(imageName);
}

/**
 * Typed lookup of one image field. Returns `fallback` when the image or the field is
 * absent or null; absent and explicitly empty are not distinguished.
 */
export function getImageProperty<K extends keyof ImageDefinition>(
    catalog: EffectiveCatalog,
    imageName: string,
    key: K,
    fallback: NonNullable<ImageDefinition[K]>
): NonNullable<ImageDefinition[K]> {
    const value = catalog.images.get(imageName)?.[key];
    return value ?? fallback;
}

export function listCategories(catalog: EffectiveCatalog): string[] {
    return [ ...new Set([ ...catalog.images.values() ].map((image) => image.category)) ].sort();
}
