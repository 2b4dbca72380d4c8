import fs from "fs";
import path from "path";

/**
 * Keeps the last applied compose document of every project under `<runtimeDir>/<project>/compose.yaml`.
 */
export class SpecStore {
    private projectsDir: string;

    constructor(runtimeDir: string) {
        this.projectsDir = runtimeDir;
    }

    getComposePath(projectName: string): string {
        return path.join(this.projectsDir, projectName, "compose.yaml");
    }

    /** Written through a temporary file so a crashed write never leaves half a document behind. */
    write(projectName: string, composeContent: string): string {
        const composePath = this.getComposePath(projectName);
        fs.mkdirSync(path.dirname(composePath), { recursive: true });
        const tmpPath = `${composePath}.tmp`;
        fs.writeFileSync(tmpPath, composeContent);
        fs.renameSync(tmpPath, composePath);
        return composePath;
    }

    delete(projectName: string): void {
        const projectDir = path.join(this.projectsDir, projectName);
        if (fs.existsSync(projectDir)) {
            fs.rmSync(projectDir, { recursive: true,
                force: true });
        }
    }
}
