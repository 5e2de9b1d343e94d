import { expect } from "chai";
import { ModelError } from "../src/errors";
import { loadModel, loadModelFile } from "../src/modelLoader";
import { getTable, onboardingQuestions, physicalTableName } from "../src/semanticModel";
import { fixturePath, fixtureYaml } from "./helpers";

interface DocumentInput {
  name: string;
  tables: Array<Record<string, unknown>>;
  relationships?: Array<Record<string, unknown>>;
  verified_queries?: Array<Record<string, unknown>>;
}

function twoTables(): DocumentInput {
  return {
    name: "mini",
    tables: [
      {
        name: "a",
        primary_key: { columns: ["id"] },
        dimensions: [
          { name: "id", expr: "id", data_type: "number" },
          { name: "b_id", expr: "b_id", data_type: "number" },
        ],
      },
      {
        name: "b",
        primary_key: { columns: ["id"] },
        dimensions: [
          { name: "id", expr: "id", data_type: "number" },
          { name: "code", expr: "code", data_type: "number" },
          { name: "label", expr: "label", data_type: "text" },
        ],
      },
    ],
    relationships: [
      {
        name: "a_to_b",
        left_table: "a",
        right_table: "b",
        relationship_columns: [{ left_column: "b_id", right_column: "id" }],
      },
    ],
  };
}

function issuesOf(definition: unknown): ModelError["issues"] {
  const result = loadModel(definition);
  if (result.ok) throw new Error("expected the model to be rejected");
  expect(result.error).to.be.instanceOf(ModelError);
  return result.error.issues;
}

describe("model loader", () => {
  it("loads the fixture model", () => {
    const result = loadModel(fixtureYaml);
    if (!result.ok) throw result.error;
    const { model } = result;

    expect(model.name).to.equal("sales");
    expect(model.tables.map((t) => t.name.key)).to.deep.equal(["ORDERS", "CUSTOMERS", "NATIONS", "WAREHOUSES"]);
    expect(result.warnings).to.deep.equal([]);
    expect(physicalTableName(getTable(model, "CUSTOMERS"))).to.equal("SALES_DB.PUBLIC.CUSTOMERS");
    expect(physicalTableName(getTable(model, "ORDERS"))).to.equal("SALES_DB.PUBLIC.ORDERS");
  });

  it("infers relationship types from keys", () => {
    const result = loadModel(fixtureYaml);
    if (!result.ok) throw result.error;
    const [declared, inferred] = result.model.relationships;

    expect(declared).to.include({ relationshipType: "many_to_one", inferred: false });
    expect(inferred).to.include({
      leftTable: "CUSTOMERS",
      rightTable: "NATIONS",
      relationshipType: "many_to_one",
      inferred: true,
      joinType: "inner",
    });
  });

  it("derives verified query tables, bindings and shape", () => {
    const result = loadModel(fixtureYaml);
    if (!result.ok) throw result.error;
    const [q17, openOrders] = result.model.verifiedQueries;

    expect(q17.tables).to.deep.equal(["ORDERS", "CUSTOMERS"]);
    expect(q17.bindings).to.deep.equal(["start_date", "end_date"]);
    expect(q17.shape).to.deep.equal({ aggregate: true, grouped: true, timeScoped: true, limited: false });
    expect(q17.verifiedAt).to.equal(1714000000);
    expect(openOrders.tables).to.deep.equal(["ORDERS"]);
    expect(openOrders.shape).to.deep.equal({ aggregate: true, grouped: false, timeScoped: false, limited: true });
    expect(onboardingQuestions(result.model)).to.deep.equal(["How many open orders are there?"]);
  });

  it("freezes the loaded model", () => {
    const result = loadModel(fixtureYaml);
    if (!result.ok) throw result.error;
    expect(Object.isFrozen(result.model)).to.equal(true);
    expect(Object.isFrozen(result.model.tables[0].fields[0])).to.equal(true);
  });

  it("loads from a file", async () => {
    const result = await loadModelFile(fixturePath);
    expect(result.ok).to.equal(true);
  });

  it("rejects a dangling relationship column", () => {
    const doc = twoTables();
    doc.relationships = [
      {
        name: "a_to_b",
        left_table: "a",
        right_table: "b",
        relationship_columns: [{ left_column: "missing", right_column: "id" }],
      },
    ];
    const issues = issuesOf(doc);

    expect(issues).to.have.length(1);
    expect(issues[0].path).to.deep.equal(["relationships", "0", "relationship_columns", "0", "left_column"]);
    expect(issues[0].message).to.equal('Column "missing" is not a declared dimension or fact of table "A"');
  });

  it("collects every issue instead of stopping at the first", () => {
    const issues = issuesOf({
      name: "broken",
      tables: [
        {
          name: "a",
          primary_key: { columns: ["id"] },
          dimensions: [{ name: "id", expr: "id", data_type: "blob" }],
        },
        {
          name: "A",
          primary_key: { columns: ["id"] },
          dimensions: [{ name: "id", expr: "id", data_type: "number" }],
        },
      ],
    });

    expect(issues.map((i) => i.path.join("."))).to.deep.equal([
      "tables.0.dimensions.0.data_type",
      "tables.0.primary_key.columns.0",
      "tables.1",
    ]);
    expect(issues[0].message).to.equal('Unknown data_type "blob"');
    expect(issues[0].suggestion).to.be.a("string");
    expect(issues[2].message).to.equal('Duplicate table "A"');
  });

  it("keeps checking the other entries after a shape error", () => {
    const doc = twoTables();
    doc.tables.push({
      name: "c",
      primary_key: { columns: ["id"] },
      dimensions: [{ name: "id", data_type: "number" }],
    });
    doc.relationships = [
      {
        name: "a_to_missing",
        left_table: "a",
        right_table: "a_missing",
        relationship_columns: [{ left_column: "nope", right_column: "id" }],
      },
      {
        name: "a_to_c",
        left_table: "a",
        right_table: "c",
        relationship_columns: [{ left_column: "b_id", right_column: "id" }],
      },
    ];
    const issues = issuesOf(doc);

    expect(issues.map((i) => i.path.join("."))).to.deep.equal([
      "tables.2.dimensions.0.expr",
      "relationships.0.right_table",
    ]);
    expect(issues[1].message).to.equal('Relationship "a_to_missing" references unknown table "a_missing"');
  });

  it("swaps sides when only the left side is keyed", () => {
    const doc = twoTables();
    doc.relationships = [
      {
        name: "b_to_a",
        left_table: "b",
        right_table: "a",
        relationship_columns: [{ left_column: "id", right_column: "b_id" }],
      },
    ];
    const result = loadModel(doc);
    if (!result.ok) throw result.error;

    expect(result.model.relationships[0]).to.deep.include({
      leftTable: "A",
      rightTable: "B",
      relationshipType: "many_to_one",
      columns: [{ left: "B_ID", right: "ID" }],
    });
    expect(result.warnings).to.have.length(1);
  });

  it("rejects many_to_many relationships, declared or inferred", () => {
    const inferred = twoTables();
    inferred.relationships = [
      {
        name: "a_to_b",
        left_table: "a",
        right_table: "b",
        relationship_columns: [{ left_column: "b_id", right_column: "code" }],
      },
    ];
    expect(issuesOf(inferred)[0].message).to.equal(
      'Relationship "a_to_b" has no primary or unique key on either side of its join columns (many_to_many)'
    );

    const declared = twoTables();
    declared.relationships = [
      {
        name: "a_to_b",
        left_table: "a",
        right_table: "b",
        relationship_type: "many_to_many",
        relationship_columns: [{ left_column: "b_id", right_column: "id" }],
      },
    ];
    expect(issuesOf(declared)[0].message).to.equal(
      'Relationship "a_to_b" is many_to_many, which cannot be joined safely'
    );
  });

  it("rejects join columns of incompatible types", () => {
    const doc = twoTables();
    doc.relationships = [
      {
        name: "a_to_b",
        left_table: "a",
        right_table: "b",
        relationship_columns: [{ left_column: "b_id", right_column: "label" }],
      },
    ];
    expect(issuesOf(doc)[0].message).to.equal("Cannot join A.B_ID (number) to B.LABEL (text)");
  });

  it("rejects unknown placeholders and bindings in verified queries", () => {
    const doc = twoTables();
    doc.verified_queries = [
      { name: "q1", question: "Everything?", sql: "SELECT * FROM {{missing}}" },
      { name: "q2", question: "Since when?", sql: "SELECT * FROM {{a}} WHERE d > :since" },
    ];
    const issues = issuesOf(doc);

    expect(issues.map((i) => i.message)).to.deep.equal([
      'Verified query "q1" references unknown table "{{missing}}"',
      'Verified query "q2" uses unknown binding ":since"',
    ]);
  });

  it("rejects an incompatible default aggregation", () => {
    const doc = twoTables();
    doc.tables[1].facts = [{ name: "note", expr: "note", data_type: "text", default_aggregation: "sum" }];
    const issues = issuesOf(doc);

    expect(issues[0].path).to.deep.equal(["tables", "1", "facts", "0", "default_aggregation"]);
    expect(issues[0].suggestion).to.equal("Use one of count, min, max.");
  });

  it("reports malformed YAML and missing sections", () => {
    expect(issuesOf("tables: [")[0].message).to.match(/^Model definition is not valid YAML/);
    expect(issuesOf({ tables: [] }).map((i) => i.path.join("."))).to.deep.equal(["name", "tables"]);
  });
});
