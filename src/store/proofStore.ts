/**
 * SQLite persistence for proof records
 */

import Database from "better-sqlite3";
import { z } from "zod";

export interface ProofRecord {
    proofId: string;
    designFile: string;
    clientTag: string;
    bgHex: string;
    colors: string[];
    createdUtc: string;
    generatedPath: string;
}

const rowSchema = z.object({
    proof_id: z.string(),
    design_file: z.string(),
    client_tag: z.string(),
    bg_hex: z.string(),
    colors_csv: z.string(),
    created_utc: z.string(),
    generated_pes_path: z.string(),
});

type ProofRow = z.infer<typeof rowSchema>;

function fromRow(row: ProofRow): ProofRecord {
    return {
        proofId: row.proof_id,
        designFile: row.design_file,
        clientTag: row.client_tag,
        bgHex: row.bg_hex,
        colors: row.colors_csv.split(",").filter((c) => c.length > 0),
        createdUtc: row.created_utc,
        generatedPath: row.generated_pes_path,
    };
}

export class ProofStore {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS proofs (
                proof_id TEXT PRIMARY KEY,
                design_file TEXT NOT NULL,
                client_tag TEXT NOT NULL,
                bg_hex TEXT NOT NULL,
                colors_csv TEXT NOT NULL,
                created_utc TEXT NOT NULL,
                generated_pes_path TEXT NOT NULL
            )
        `);
    }

    insert(record: ProofRecord): void {
        this.db
            .prepare(
                `INSERT INTO proofs (proof_id, design_file, client_tag, bg_hex, colors_csv, created_utc, generated_pes_path)
                 VALUES (?, ?, ?, ?, ?, ?, ?)`
            )
            .run(
                record.proofId,
                record.designFile,
                record.clientTag,
                record.bgHex,
                record.colors.join(","),
                record.createdUtc,
                record.generatedPath
            );
    }

    get(proofId: string): ProofRecord | null {
        const row: unknown = this.db.prepare("SELECT * FROM proofs WHERE proof_id = ?").get(proofId.trim());
        if (row === undefined) {
            return null;
        }
        return fromRow(rowSchema.parse(row));
    }

    /**
     * Most recent proofs first
     */
    listRecent(limit: number = 200): ProofRecord[] {
        const rows: unknown[] = this.db
            .prepare("SELECT * FROM proofs ORDER BY created_utc DESC LIMIT ?")
            .all(limit);
        return rows.map((row) => fromRow(rowSchema.parse(row)));
    }

    close(): void {
        if (this.db.open) {
            this.db.close();
        }
    }
}
