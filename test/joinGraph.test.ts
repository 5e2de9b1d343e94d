import { expect } from "chai";
import { UnreachableError } from "../src/errors";
import { inferRelationshipType, planTables, resolveJoins } from "../src/joinGraph";
import { loadModel } from "../src/modelLoader";
import { type SemanticModel, getTable } from "../src/semanticModel";
import { fixtureModel } from "./helpers";

function oneToOneModel(joinType: "inner" | "left_outer"): SemanticModel {
  const result = loadModel({
    name: "pair",
    tables: [
      { name: "a", primary_key: { columns: ["id"] }, dimensions: [{ name: "id", expr: "id", data_type: "number" }] },
      { name: "b", primary_key: { columns: ["id"] }, dimensions: [{ name: "id", expr: "id", data_type: "number" }] },
    ],
    relationships: [
      {
        name: "a_b",
        left_table: "a",
        right_table: "b",
        join_type: joinType,
        relationship_type: "one_to_one",
        relationship_columns: [{ left_column: "id", right_column: "id" }],
      },
    ],
  });
  if (!result.ok) throw result.error;
  return result.model;
}

/** Two 2-hop routes from X to Y; the one through SPOKE fans out and is declared first. */
function twoRouteModel(): SemanticModel {
  const table = (name: string, columns: string[]) => ({
    name,
    primary_key: { columns: ["id"] },
    dimensions: ["id", ...columns].map((column) => ({ name: column, expr: column, data_type: "number" })),
  });
  const manyToOne = (name: string, left: string, right: string, column: string) => ({
    name,
    left_table: left,
    right_table: right,
    relationship_type: "many_to_one",
    relationship_columns: [{ left_column: column, right_column: "id" }],
  });
  const result = loadModel({
    name: "routes",
    tables: [table("x", ["hub_id"]), table("y", []), table("hub", ["y_id"]), table("spoke", ["x_id", "y_id"])],
    relationships: [
      manyToOne("spoke_to_x", "spoke", "x", "x_id"),
      manyToOne("spoke_to_y", "spoke", "y", "y_id"),
      manyToOne("x_to_hub", "x", "hub", "hub_id"),
      manyToOne("hub_to_y", "hub", "y", "y_id"),
    ],
  });
  if (!result.ok) throw result.error;
  return result.model;
}

describe("join graph resolver", () => {
  const model = fixtureModel();

  it("pulls in intermediate tables to connect the request", () => {
    const plan = resolveJoins(model, ["ORDERS", "NATIONS"]);

    expect(planTables(plan)).to.deep.equal(["ORDERS", "CUSTOMERS", "NATIONS"]);
    expect(plan.steps.map((s) => s.joinType)).to.deep.equal(["inner", "inner"]);
    expect(plan.steps.map((s) => s.from)).to.deep.equal(["ORDERS", "CUSTOMERS"]);
    expect(plan.steps[1].columnPairs).to.deep.equal([{ left: "NATION_ID", right: "NATION_ID" }]);
    expect(plan.rationale).to.deep.equal([
      "root ORDERS",
      "NATIONS reached in 2 hops via orders_to_customers (many_to_one) -> customers_to_nations (many_to_one)",
      "chose root ORDERS among 2 candidates (2 joins, 0 one_to_many)",
    ]);
  });

  it("prefers the root that avoids fan-out", () => {
    const plan = resolveJoins(model, ["CUSTOMERS", "ORDERS"]);

    expect(plan.root).to.equal("ORDERS");
    expect(plan.steps).to.have.length(1);
    expect(plan.steps[0]).to.deep.include({
      table: "CUSTOMERS",
      relationship: "orders_to_customers",
      direction: "many_to_one",
    });
  });

  it("prefers many_to_one hops among paths of equal length", () => {
    const plan = resolveJoins(twoRouteModel(), ["X", "Y"]);

    expect(plan.root).to.equal("X");
    expect(planTables(plan)).to.deep.equal(["X", "HUB", "Y"]);
    expect(plan.steps.map((s) => s.direction)).to.deep.equal(["many_to_one", "many_to_one"]);
    expect(plan.steps.map((s) => s.relationship)).to.deep.equal(["x_to_hub", "hub_to_y"]);
  });

  it("plans a single table without joins", () => {
    const plan = resolveJoins(model, ["ORDERS", "ORDERS"]);
    expect(plan.root).to.equal("ORDERS");
    expect(plan.steps).to.deep.equal([]);
    expect(plan.rationale).to.deep.equal(["root ORDERS"]);
  });

  it("fails on disconnected tables instead of cross joining", () => {
    try {
      resolveJoins(model, ["ORDERS", "WAREHOUSES"]);
      expect.fail("expected UnreachableError");
    } catch (err) {
      expect(err).to.be.instanceOf(UnreachableError);
      if (!(err instanceof UnreachableError)) return;
      expect(err.from).to.equal("ORDERS");
      expect(err.to).to.equal("WAREHOUSES");
    }
  });

  it("needs at least one table", () => {
    expect(() => resolveJoins(model, [])).to.throw(RangeError);
  });

  it("turns a left outer join into a right outer join when walked backwards", () => {
    const plan = resolveJoins(oneToOneModel("left_outer"), ["B", "A"]);

    expect(plan.root).to.equal("B");
    expect(plan.steps[0]).to.deep.include({ table: "A", joinType: "right_outer", direction: "one_to_one" });
  });

  it("keeps the declared join type when walked forwards", () => {
    const plan = resolveJoins(oneToOneModel("left_outer"), ["A", "B"]);
    expect(plan.steps[0].joinType).to.equal("left_outer");
  });
});

describe("relationship type inference", () => {
  const model = fixtureModel();
  const customers = getTable(model, "CUSTOMERS");
  const nations = getTable(model, "NATIONS");

  it("keyed right side is many_to_one", () => {
    expect(inferRelationshipType(customers, nations, ["NATION_ID"], ["NATION_ID"])).to.deep.equal({
      type: "many_to_one",
      swapped: false,
    });
  });

  it("keyed left side swaps", () => {
    expect(inferRelationshipType(nations, customers, ["NATION_ID"], ["NATION_ID"])).to.deep.equal({
      type: "many_to_one",
      swapped: true,
    });
  });

  it("both sides keyed is one_to_one", () => {
    expect(inferRelationshipType(nations, nations, ["NATION_ID"], ["NATION_ID"])).to.deep.equal({
      type: "one_to_one",
      swapped: false,
    });
  });

  it("neither side keyed is many_to_many", () => {
    expect(inferRelationshipType(customers, customers, ["SEGMENT"], ["SEGMENT"])).to.deep.equal({
      type: "many_to_many",
    });
  });
});
