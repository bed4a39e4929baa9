/**
 * Schema Fetcher Tests
 *
 * MySQL and PostgreSQL fetchers run against canned catalog rows; the SQLite
 * fetcher runs against a real database file.
 */
import { describe, expect, it, layer } from "@effect/vitest"
import { Effect, Layer } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { NodeFileSystem, NodePath } from "@effect/platform-node"
import Database from "better-sqlite3"
import {
  MYSQL_COLUMNS_QUERY,
  MYSQL_DATABASE_QUERY,
  MYSQL_TABLES_QUERY,
  newMySQLSchemaFetcher,
} from "../fetchers/mysql.js"
import {
  POSTGRES_COLUMNS_QUERY,
  POSTGRES_DATABASE_QUERY,
  POSTGRES_TABLES_QUERY,
  newPostgresSchemaFetcher,
} from "../fetchers/postgres.js"
import { getSchemaFetcherFactory, isSupportedDriver } from "../fetchers/registry.js"
import { databaseNameFromFile, newSQLite3SchemaFetcher } from "../fetchers/sqlite.js"
import { createSqlConnector } from "../services/sql-client.js"
import { fakeSqlClient } from "../testing.js"

const TestLayer = Layer.merge(NodeFileSystem.layer, NodePath.layer)

describe("MySQL schema fetcher", () => {
  const client = fakeSqlClient("mysql", [
    { match: MYSQL_DATABASE_QUERY, rows: [{ name: "shop" }] },
    { match: MYSQL_TABLES_QUERY, rows: [{ table_name: "orders" }, { table_name: "users" }] },
    {
      match: MYSQL_COLUMNS_QUERY,
      rows: [
        { column_name: "id", data_type: "INT", column_type: "int(10) unsigned", is_nullable: "NO", column_comment: "" },
        {
          column_name: "note",
          data_type: "varchar",
          column_type: "varchar(255)",
          is_nullable: "YES",
          column_comment: "free text",
        },
      ],
    },
  ])
  const fetcher = newMySQLSchemaFetcher(client)

  it.effect("reads the selected database", () =>
    Effect.gen(function* () {
      expect(yield* fetcher.getDatabaseName).toBe("shop")
    })
  )

  it.effect("lists base tables", () =>
    Effect.gen(function* () {
      expect(yield* fetcher.getTableNames).toEqual(["orders", "users"])
    })
  )

  it.effect("describes columns in order", () =>
    Effect.gen(function* () {
      const columns = yield* fetcher.getFieldDescriptors("orders")
      expect(columns).toEqual([
        { name: "id", rawType: "int", size: 10, unsigned: true, nullable: false, comment: "" },
        { name: "note", rawType: "varchar", size: 255, unsigned: false, nullable: true, comment: "free text" },
      ])
      expect(client.calls.at(-1)?.params).toEqual(["orders"])
    })
  )

  it("quotes identifiers with backticks", () => {
    expect(fetcher.quoteIdentifier("order")).toBe("`order`")
    expect(fetcher.quoteIdentifier("we`ird")).toBe("`we``ird`")
  })

  it.effect("fails with NoDatabaseSelected when no database is selected", () =>
    Effect.gen(function* () {
      const noDatabase = newMySQLSchemaFetcher(
        fakeSqlClient("mysql", [{ match: MYSQL_DATABASE_QUERY, rows: [{ name: null }] }])
      )
      const error = yield* Effect.flip(noDatabase.getDatabaseName)
      expect(error._tag).toBe("NoDatabaseSelected")
      expect(error.message).toBe("no database selected")
    })
  )

  it.effect("reports catalog rows of the wrong shape", () =>
    Effect.gen(function* () {
      const broken = newMySQLSchemaFetcher(
        fakeSqlClient("mysql", [{ match: MYSQL_COLUMNS_QUERY, rows: [{ column_name: "id" }] }])
      )
      const error = yield* Effect.flip(broken.getFieldDescriptors("orders"))
      expect(error._tag).toBe("IntrospectionFailed")
      if (error._tag === "IntrospectionFailed") {
        expect(error.query).toBe(MYSQL_COLUMNS_QUERY)
      }
    })
  )
})

describe("PostgreSQL schema fetcher", () => {
  const client = fakeSqlClient("postgres", [
    { match: POSTGRES_DATABASE_QUERY, rows: [{ name: "shop", schema: "public" }] },
    { match: POSTGRES_TABLES_QUERY, rows: [{ table_name: "users" }] },
    {
      match: POSTGRES_COLUMNS_QUERY,
      rows: [
        { column_name: "id", data_type: "bigint", is_nullable: "NO", size: null, column_comment: null },
        { column_name: "name", data_type: "character varying", is_nullable: "YES", size: 64, column_comment: "display name" },
        { column_name: "mood", data_type: "enum", is_nullable: "NO", size: null, column_comment: null },
      ],
    },
  ])
  const fetcher = newPostgresSchemaFetcher(client)

  it.effect("reads the current database and tables", () =>
    Effect.gen(function* () {
      expect(yield* fetcher.getDatabaseName).toBe("shop")
      expect(yield* fetcher.getTableNames).toEqual(["users"])
    })
  )

  it.effect("describes columns, defaulting size and comment", () =>
    Effect.gen(function* () {
      const columns = yield* fetcher.getFieldDescriptors("users")
      expect(columns).toEqual([
        { name: "id", rawType: "bigint", size: 0, unsigned: false, nullable: false, comment: "" },
        {
          name: "name",
          rawType: "character varying",
          size: 64,
          unsigned: false,
          nullable: true,
          comment: "display name",
        },
        { name: "mood", rawType: "enum", size: 0, unsigned: false, nullable: false, comment: "" },
      ])
      expect(client.calls.at(-1)?.params).toEqual(["users"])
    })
  )

  it.effect("fails with NoDatabaseSelected when the search_path names no existing schema", () =>
    Effect.gen(function* () {
      const noSchema = newPostgresSchemaFetcher(
        fakeSqlClient("postgres", [{ match: POSTGRES_DATABASE_QUERY, rows: [{ name: "shop", schema: null }] }])
      )
      const error = yield* Effect.flip(noSchema.getDatabaseName)
      expect(error._tag).toBe("NoDatabaseSelected")
      expect(error.message).toBe("no schema selected: no schema on the search_path exists")
    })
  )

  it("quotes identifiers with double quotes", () => {
    expect(fetcher.quoteIdentifier("user")).toBe('"user"')
    expect(fetcher.quoteIdentifier('a"b')).toBe('"a""b"')
  })
})

layer(TestLayer)("SQLite schema fetcher", it => {
  it("names the database after its file", () => {
    expect(databaseNameFromFile("/data/shop.db")).toBe("shop")
    expect(databaseNameFromFile("inventory.sqlite3")).toBe("inventory")
    expect(databaseNameFromFile("")).toBe("")
    expect(databaseNameFromFile(null)).toBe("")
  })

  it.effect("reads a database file", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const pathSvc = yield* Path.Path
      const dir = yield* fs.makeTempDirectoryScoped({ prefix: "tablecast-sqlite-" })
      const file = pathSvc.join(dir, "shop.db")

      const db = new Database(file)
      db.exec(`
        CREATE TABLE users (id INTEGER PRIMARY KEY, name VARCHAR(64) NOT NULL, email TEXT);
        CREATE TABLE orders (id INTEGER PRIMARY KEY, total DECIMAL(10,2));
      `)
      db.close()

      const client = yield* createSqlConnector().open("sqlite3", file)
      const fetcher = newSQLite3SchemaFetcher(client)

      expect(yield* fetcher.getDatabaseName).toBe("shop")
      expect(yield* fetcher.getTableNames).toEqual(["orders", "users"])
      expect(yield* fetcher.getFieldDescriptors("users")).toEqual([
        { name: "id", rawType: "integer", size: 0, unsigned: false, nullable: false, comment: "" },
        { name: "name", rawType: "varchar", size: 64, unsigned: false, nullable: false, comment: "" },
        { name: "email", rawType: "text", size: 0, unsigned: false, nullable: true, comment: "" },
      ])
      expect(yield* fetcher.getFieldDescriptors("orders")).toEqual([
        { name: "id", rawType: "integer", size: 0, unsigned: false, nullable: false, comment: "" },
        { name: "total", rawType: "decimal", size: 10, unsigned: false, nullable: true, comment: "" },
      ])
    }).pipe(Effect.scoped)
  )

  it.effect("fails with ConnectionFailed for a missing file", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(createSqlConnector().open("sqlite3", "/nonexistent/tablecast/shop.db"))
      expect(error._tag).toBe("ConnectionFailed")
      expect(error.driver).toBe("sqlite3")
    }).pipe(Effect.scoped)
  )
})

describe("fetcher registry", () => {
  it("knows the supported drivers", () => {
    expect(isSupportedDriver("mysql")).toBe(true)
    expect(isSupportedDriver("sqlite3")).toBe(true)
    expect(isSupportedDriver("postgres")).toBe(true)
    expect(isSupportedDriver("oracle")).toBe(false)
  })

  it("returns a factory only for supported drivers", () => {
    expect(getSchemaFetcherFactory("postgres")._tag).toBe("Some")
    expect(getSchemaFetcherFactory("sqlite")._tag).toBe("None")
  })
})
