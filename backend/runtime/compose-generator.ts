import fs from "fs";
import path from "path";
import YAML from "yaml";
import { ImageDefinition, Volume } from "../catalog/types.js";
import { log } from "../log.js";
import { RuntimeSpec, ServiceSpec } from "./types.js";

export interface GenerateOptions {
    /** Compose project name. */
    projectName: string;
    networkName: string;
    /** Host directory mounted at /shared in every service. */
    sharedDir: string;
    /** Relative bind/file host paths resolve against this directory. */
    projectRoot: string;
    prefix: string;
}

export class VolumeProvisionError extends Error {
    constructor(readonly hostPath: string, message: string) {
        super(message);
        this.name = "VolumeProvisionError";
    }
}

export const SHARED_MOUNT_PATH = "/shared";

export function containerName(prefix: string, imageName: string): string {
    return `${prefix}-${imageName}`;
}

export function labelKeys(prefix: string): { managed: string; image: string } {
    return {
        managed: `${prefix}.managed`,
        image: `${prefix}.image`,
    };
}

/**
 * Compose project names only take lowercase letters, digits, dashes and underscores.
 */
export function projectName(prefix: string, imageName: string): string {
    return `${prefix}-${imageName}`.toLowerCase().replace(/[^a-z0-9_-]/g, "-");
}

function serviceKey(imageName: string): string {
    return imageName.replace(/[^a-zA-Z0-9._-]/g, "-");
}

export function resolveHostPath(host: string, projectRoot: string): string {
    return path.isAbsolute(host) ? host : path.join(projectRoot, host);
}

/**
 * Creates the host side of a bind (directory) or file (empty file) volume when missing.
 * Existing paths are reused untouched. Returns the absolute host path.
 */
export function provisionHostPath(volume: Volume, projectRoot: string): string {
    if (volume.type === "named") {
        throw new VolumeProvisionError(volume.name, "Named volumes have no host path");
    }

    const hostPath = resolveHostPath(volume.host, projectRoot);
    const stat = fs.statSync(hostPath, { throwIfNoEntry: false });

    if (stat) {
        if (volume.type === "bind" && !stat.isDirectory()) {
            throw new VolumeProvisionError(hostPath, `Path exists but is not a directory: ${hostPath}`);
        }
        if (volume.type === "file" && !stat.isFile()) {
            throw new VolumeProvisionError(hostPath, `Path exists but is not a file: ${hostPath}`);
        }
        return hostPath;
    }

    try {
        if (volume.type === "bind") {
            fs.mkdirSync(hostPath, { recursive: true });
            log.info("compose", `Created bind mount directory: ${hostPath}`);
        } else {
            fs.mkdirSync(path.dirname(hostPath), { recursive: true });
            fs.writeFileSync(hostPath, "", { flag: "a" });
            log.info("compose", `Created file mount: ${hostPath}`);
        }
    } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new VolumeProvisionError(hostPath, `Failed to prepare volume ${hostPath}: ${msg}`);
    }

    return hostPath;
}

function volumeEntry(volume: Volume, projectRoot: string): string {
    const source = volume.type === "named" ? volume.name : provisionHostPath(volume, projectRoot);
    return volume.readonly ? `${source}:${volume.path}:ro` : `${source}:${volume.path}`;
}

function buildService(image: ImageDefinition, options: GenerateOptions): ServiceSpec {
    const labels = labelKeys(options.prefix);

    const service: ServiceSpec = {
        ...image.composeParams,
        image: image.image,
        container_name: containerName(options.prefix, image.name),
        hostname: image.name,
        command: image.keepAliveCmd,
        stdin_open: true,
        tty: true,
        volumes: [
            `${options.sharedDir}:${SHARED_MOUNT_PATH}`,
            ...image.volumes.map((volume) => volumeEntry(volume, options.projectRoot)),
        ],
        networks: [ options.networkName ],
        labels: {
            [labels.managed]: "true",
            [labels.image]: image.name,
        },
    };

    if (image.privileged) {
        service.privileged = true;
    }
    if (Object.keys(image.environment).length > 0) {
        service.environment = { ...image.environment };
    }
    if (image.ports.length > 0) {
        service.ports = [ ...image.ports ];
    }

    return service;
}

/**
 * Builds the compose document for the selected images. Bind and file host paths are
 * created as a side effect when missing.
 */
export function generate(images: readonly ImageDefinition[], options: GenerateOptions): RuntimeSpec {
    const services: Record<string, ServiceSpec> = {};
    const namedVolumes = new Set<string>();

    for (const image of images) {
        services[serviceKey(image.name)] = buildService(image, options);
        for (const volume of image.volumes) {
            if (volume.type === "named") {
                namedVolumes.add(volume.name);
            }
        }
    }

    const spec: RuntimeSpec = {
        name: options.projectName,
        services,
        networks: {
            [options.networkName]: {
                name: options.networkName,
                external: true,
            },
        },
    };

    if (namedVolumes.size > 0) {
        spec.volumes = Object.fromEntries([ ...namedVolumes ].map((name) => [ name, { name } ]));
    }

    return spec;
}

export function toComposeYAML(spec: RuntimeSpec): string {
    return YAML.stringify(spec);
}
