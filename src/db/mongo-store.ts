/**
 * Propósito: base común de los repositorios Mongo del mercado. Resuelve la colección, asegura
 * índices de forma perezosa, valida cada documento con Zod y envuelve las llamadas al driver en
 * `Result`.
 * Encaje: cada repositorio (`@/db/repositories/*`) compone un `MongoCollection<T>` en lugar de
 * repetir conexión, parseo y manejo de errores.
 * Invariantes: todos los documentos tienen `_id: string`; un documento que no pasa el esquema se
 * registra en logs y se trata como inexistente (nunca se devuelve un shape inválido).
 * Gotchas: un fallo creando índices se loguea y no bloquea el acceso; se pierden garantías de
 * unicidad hasta que se corrija.
 */
import type { Collection, CreateIndexesOptions, Document, IndexSpecification } from "mongodb";
import type { z } from "zod";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { getDb } from "./mongo";

export interface IndexDefinition {
  key: IndexSpecification;
  options?: CreateIndexesOptions;
}

/** Traduce errores del driver (`11000` clave duplicada) a un código de dominio. */
export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === 11000;

export class MongoCollection<T extends Document & { _id: string }> {
  private indexesEnsured: Promise<void> | null = null;

  constructor(
    readonly name: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly indexes: IndexDefinition[] = [],
  ) {}

  async collection(): Promise<Collection<T>> {
    const db = await getDb();
    if (!this.indexesEnsured) {
      // Lazy init: only collections that are actually used pay for it.
      this.indexesEnsured = this.ensureIndexes();
    }
    await this.indexesEnsured;
    return db.collection<T>(this.name);
  }

  private async ensureIndexes(): Promise<void> {
    if (!this.indexes.length) return;
    try {
      const col = (await getDb()).collection(this.name);
      for (const index of this.indexes) {
        await col.createIndex(index.key, index.options ?? {});
      }
    } catch (error) {
      console.error(`[MongoCollection:${this.name}] failed to ensure indexes`, error);
    }
  }

  parse(doc: unknown): T | null {
    if (doc === null || doc === undefined) return null;
    const parsed = this.schema.safeParse(doc);
    if (parsed.success) return parsed.data;

    const id =
      typeof doc === "object" && "_id" in doc ? String(doc._id) : "unknown";
    console.error(`[MongoCollection:${this.name}] invalid document; ignoring`, {
      id,
      error: parsed.error,
    });
    return null;
  }

  parseMany(docs: unknown[]): T[] {
    const out: T[] = [];
    for (const doc of docs) {
      const parsed = this.parse(doc);
      if (parsed) out.push(parsed);
    }
    return out;
  }

  /** Ejecuta una operación de DB y la devuelve como `Result<R>`. */
  async run<R>(
    op: (col: Collection<T>) => Promise<R>,
    mapError: (error: unknown) => Error = toError,
  ): Promise<Result<R>> {
    try {
      const col = await this.collection();
      return OkResult(await op(col));
    } catch (error) {
      return ErrResult(mapError(error));
    }
  }
}
