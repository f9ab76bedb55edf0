import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { PGlite } from "@electric-sql/pglite";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { createProgram } from "./commands";

/**
 * Runs the commands in process against a PGLite database persisted to a temp directory.
 */
describe("exclusive-arc commands", () => {
    let tempDir: string;
    let connection: string;
    let mappingPath: string;
    let log: string[];
    let errors: string[];

    async function run(...args: string[]): Promise<void> {
        await createProgram().parseAsync(["node", "exclusive-arc", ...args]);
    }

    beforeEach(async () => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "exclusive-arc-"));
        const dbPath = path.join(tempDir, "db");
        connection = `pglite:${dbPath}`;

        const db = new PGlite(dbPath);
        await db.exec(`
            CREATE TABLE employees (id INTEGER PRIMARY KEY);
            CREATE TABLE products (id INTEGER PRIMARY KEY);
            CREATE TABLE comments (id SERIAL PRIMARY KEY, employee_id INTEGER, product_id INTEGER);
        `);
        await db.close();

        mappingPath = path.join(tempDir, "mappings.json");
        fs.writeFileSync(mappingPath, JSON.stringify({
            mappings: [
                { ownerTable: "comments", role: "subject", relations: { employee_id: "employees", product_id: "products" } },
            ],
        }));

        log = [];
        errors = [];
        vi.spyOn(console, "log").mockImplementation((line: unknown) => { log.push(String(line)); });
        vi.spyOn(console, "error").mockImplementation((line: unknown) => { errors.push(String(line)); });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        vi.unstubAllEnvs();
        process.exitCode = undefined;
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    test("sql prints the add statements", async () => {
        await run("sql", "-f", mappingPath);

        expect(log).toHaveLength(6);
        expect(log[0]).toBe(
            'ALTER TABLE "comments" ADD CONSTRAINT "comments_employee_id_fkey" FOREIGN KEY ("employee_id") REFERENCES "employees" ("id");'
        );
        expect(log[5]).toBe(
            'CREATE TRIGGER "comments_subject_exclusive" BEFORE INSERT OR UPDATE ON "comments" FOR EACH ROW EXECUTE FUNCTION "comments_subject_exclusive_check"();'
        );
    });

    test("sql --down --dialect mysql prints the remove statements", async () => {
        await run("sql", "-f", mappingPath, "--down", "--dialect", "mysql");

        expect(log).toEqual([
            "DROP TRIGGER `comments_subject_exclusive_update`;",
            "DROP TRIGGER `comments_subject_exclusive_insert`;",
            "ALTER TABLE `comments` DROP FOREIGN KEY `comments_product_id_fkey`;",
            "ALTER TABLE `comments` DROP FOREIGN KEY `comments_employee_id_fkey`;",
            "DROP INDEX `index_comments_on_product_id` ON `comments`;",
            "DROP INDEX `index_comments_on_employee_id` ON `comments`;",
        ]);
    });

    test("up, status and down", async () => {
        await run("status", "-c", connection, "-f", mappingPath);
        await run("up", "-c", connection, "-f", mappingPath);
        await run("status", "-c", connection, "-f", mappingPath);
        await run("down", "-c", connection, "-f", mappingPath);
        await run("status", "-c", connection, "-f", mappingPath);

        expect(log).toEqual([
            "comments.subject: absent",
            "Applied 6 statement(s).",
            "comments.subject: applied",
            "Applied 6 statement(s).",
            "comments.subject: absent",
        ]);
        expect(errors).toEqual([]);
        expect(process.exitCode).toBeUndefined();
    });

    test("status lists missing objects of a partial mapping", async () => {
        await run("up", "-c", connection, "-f", mappingPath);
        const db = new PGlite(path.join(tempDir, "db"));
        await db.exec("DROP INDEX index_comments_on_product_id");
        await db.close();

        log = [];
        await run("status", "-c", connection, "-f", mappingPath);

        expect(log).toEqual([
            "comments.subject: partial",
            "  missing index index_comments_on_product_id",
        ]);
    });

    test("up --dry-run prints without applying", async () => {
        await run("up", "-c", connection, "-f", mappingPath, "--dry-run");
        expect(log).toHaveLength(6);

        log = [];
        await run("status", "-c", connection, "-f", mappingPath);
        expect(log).toEqual(["comments.subject: absent"]);
    });

    test("down --dry-run prints without a connection", async () => {
        vi.stubEnv("DATABASE_URL", "");
        await run("down", "-f", mappingPath, "--dry-run");

        expect(errors).toEqual([]);
        expect(log[0]).toBe('DROP TRIGGER "comments_subject_exclusive" ON "comments";');
        expect(log).toHaveLength(6);
    });

    test("reports errors and sets the exit code", async () => {
        await run("sql", "-f", mappingPath, "--dialect", "oracle");

        expect(errors).toEqual(['Error: Unknown dialect "oracle". Expected postgres or mysql.']);
        expect(process.exitCode).toBe(1);
    });

    test("requires a connection string", async () => {
        vi.stubEnv("DATABASE_URL", "");
        await run("up", "-f", mappingPath);

        expect(errors).toEqual(["Error: No connection string. Pass -c or set DATABASE_URL."]);
        expect(process.exitCode).toBe(1);
    });

    test("refuses to migrate a mysql mapping file", async () => {
        const mysqlPath = path.join(tempDir, "mysql.json");
        fs.writeFileSync(mysqlPath, JSON.stringify({ ...JSON.parse(fs.readFileSync(mappingPath, "utf-8")), dialect: "mysql" }));

        await run("up", "-c", connection, "-f", mysqlPath);

        expect(errors).toEqual([
            "Error: Migrations only run against PostgreSQL; use the sql command for other dialects.",
        ]);
    });
});
