import type pg from "pg";
import { newDb, type IBackup, type IMemoryDb } from "pg-mem";
import { ensureSchema } from "./db.js";
import { RECORD_COLUMNS, recordSchema, type StudyRecord } from "./record.js";

// The pg adapter commits each statement on its own, so BEGIN/COMMIT/ROLLBACK
// are replayed here with restore points.
const emulateTransactions = (mem: IMemoryDb) => {
  let restorePoint: IBackup | null = null;
  mem.public.interceptQueries((sql) => {
    switch (sql.trim().toUpperCase()) {
      case "BEGIN":
        restorePoint = mem.backup();
        return [];
      case "COMMIT":
        restorePoint = null;
        return [];
      case "ROLLBACK":
        restorePoint?.restore();
        restorePoint = null;
        return [];
      default:
        return null;
    }
  });
};

/** In-process PostgreSQL stand-in with the catalog schema applied. */
export const createMemoryDb = async ({ transactions = true } = {}): Promise<{ mem: IMemoryDb; pool: pg.Pool }> => {
  const mem = newDb();
  if (transactions) emulateTransactions(mem);
  const { Pool } = mem.adapters.createPg();
  const pool: pg.Pool = new Pool();
  await ensureSchema(pool);
  return { mem, pool };
};

export const createMemoryPool = async (): Promise<pg.Pool> => (await createMemoryDb()).pool;

export const makeRecord = (id: string, fields: Partial<StudyRecord> = {}): StudyRecord =>
  recordSchema.parse({
    ...Object.fromEntries(RECORD_COLUMNS.map((column) => [column, null])),
    ...fields,
    gse_id: id
  });

export const sampleRecords = (): StudyRecord[] => [
  makeRecord("GSE100001", {
    title: "Single-cell atlas of the human placenta at term",
    organism: "Homo sapiens",
    data_type: "Expression profiling by high throughput sequencing",
    library_strategy: "RNA-Seq",
    platform_id: "GPL24676",
    pregnancy_trimester: "Third",
    sample_size: 12,
    pregnancy_complications_list: "Preeclampsia",
    contact_name: "Ada Lovelace"
  }),
  makeRecord("GSE100002", {
    title: "Villous trophoblast methylation in early pregnancy",
    organism: "Homo sapiens",
    data_type: "Methylation profiling by array",
    library_strategy: null,
    platform_id: "GPL21145",
    pregnancy_trimester: "First",
    sample_size: 40,
    fetal_complications_list: "Fetal growth restriction",
    contact_name: "Grace Hopper"
  }),
  makeRecord("GSE100003", {
    title: "Labyrinth zone development in the mouse",
    organism: "Mus musculus",
    data_type: "Expression profiling by high throughput sequencing",
    library_strategy: "RNA-Seq",
    platform_id: "GPL24247",
    pregnancy_trimester: "Second",
    sample_size: 6,
    contact_name: "Rosalind Franklin",
    doi: ""
  }),
  makeRecord("GSE100004", {
    title: "Maternal obesity and placental transcriptome",
    organism: "Homo sapiens",
    data_type: "Expression profiling by high throughput sequencing",
    library_strategy: "RNA-Seq",
    platform_id: "GPL24676",
    pregnancy_trimester: "Third",
    sample_size: 88,
    pregnancy_complications_list: "Gestational diabetes; Preeclampsia",
    contact_name: "Barbara McClintock"
  })
];
