import * as sinon from 'sinon';
import * as fs from 'fs';
import * as os from 'os';
import * as pt from 'path';

export type FakeLogger = {
    info: sinon.SinonSpy;
    warning: sinon.SinonSpy;
    debug: sinon.SinonSpy;
    error: sinon.SinonSpy;
}

export function createFakeLogger(sandbox: sinon.SinonSandbox): FakeLogger {
    return {
        info: sandbox.fake(),
        warning: sandbox.fake(),
        debug: sandbox.fake(),
        error: sandbox.fake()
    };
}

export function reportFixture(name: string): string {
    return pt.join(__dirname, 'resources/reports', name);
}

/**
 * Creates a project tree under the OS temp dir. Keys are relative paths, values are file contents
 * or the name of a report fixture to copy (prefixed with "fixture:").
 */
export function createTempProject(files: Record<string, string>): string {
    const root = fs.mkdtempSync(pt.join(os.tmpdir(), 'jacoco-scope-'));
    for (const [relativePath, content] of Object.entries(files)) {
        const filePath = pt.join(root, relativePath);
        fs.mkdirSync(pt.dirname(filePath), { recursive: true });
        if (content.startsWith('fixture:')) {
            fs.copyFileSync(reportFixture(content.substring('fixture:'.length)), filePath);
        } else {
            fs.writeFileSync(filePath, content);
        }
    }
    return root;
}

export function removeTempProject(root: string): void {
    fs.rmSync(root, { recursive: true, force: true });
}
