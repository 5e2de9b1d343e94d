import { expect } from "chai";
import { emit, needsGrouping } from "../src/emitter";
import { InvalidRequestError } from "../src/errors";
import type { Projection } from "../src/substitution";

const plain = (expr: string, alias: string): Projection => ({ expr, alias, aggregate: false, table: "T" });
const aggregated = (expr: string, alias: string): Projection => ({ expr, alias, aggregate: true, table: "T" });

describe("emitter", () => {
  it("writes every clause in order", () => {
    const sql = emit({
      from: { table: "DB.S.ORDERS", alias: "ORDERS" },
      joins: [
        {
          table: "DB.S.CUSTOMERS",
          alias: "CUSTOMERS",
          joinType: "left_outer",
          on: ["ORDERS.CID = CUSTOMERS.CID", "ORDERS.REGION = CUSTOMERS.REGION"],
        },
      ],
      projections: [plain("CUSTOMERS.SEGMENT", "SEGMENT"), aggregated("SUM(ORDERS.AMOUNT)", "AMOUNT")],
      filters: ["ORDERS.STATUS = 'O' OR ORDERS.STATUS = 'P'", "ORDERS.REGION = 'EMEA'"],
      having: ["SUM(ORDERS.AMOUNT) > 100"],
      limit: 10,
    });

    expect(sql).to.equal(
      [
        "SELECT",
        "  CUSTOMERS.SEGMENT AS SEGMENT,",
        "  SUM(ORDERS.AMOUNT) AS AMOUNT",
        "FROM DB.S.ORDERS AS ORDERS",
        "LEFT OUTER JOIN DB.S.CUSTOMERS AS CUSTOMERS",
        "  ON ORDERS.CID = CUSTOMERS.CID AND ORDERS.REGION = CUSTOMERS.REGION",
        "WHERE (ORDERS.STATUS = 'O' OR ORDERS.STATUS = 'P')",
        "  AND ORDERS.REGION = 'EMEA'",
        "GROUP BY CUSTOMERS.SEGMENT",
        "HAVING SUM(ORDERS.AMOUNT) > 100",
        "LIMIT 10",
      ].join("\n")
    );
  });

  it("omits GROUP BY when nothing is aggregated", () => {
    const sql = emit({
      from: { table: "ORDERS", alias: "ORDERS" },
      joins: [],
      projections: [plain("ORDERS.ID", "ID")],
      filters: [],
      having: [],
    });
    expect(sql).to.equal("SELECT\n  ORDERS.ID AS ID\nFROM ORDERS");
  });

  it("omits GROUP BY when everything is aggregated", () => {
    const sql = emit({
      from: { table: "ORDERS", alias: "ORDERS" },
      joins: [],
      projections: [aggregated("COUNT(*)", "N")],
      filters: ["ORDERS.X = 1"],
      having: [],
    });
    expect(sql).to.equal("SELECT\n  COUNT(*) AS N\nFROM ORDERS\nWHERE ORDERS.X = 1");
  });

  it("groups by each plain projection once", () => {
    const projections = [
      plain("T.A", "A"),
      aggregated("SUM(T.X)", "X"),
      plain("T.B", "B"),
      plain("T.A", "A2"),
    ];
    expect(needsGrouping(projections)).to.equal(true);
    const sql = emit({ from: { table: "T", alias: "T" }, joins: [], projections, filters: [], having: [] });
    expect(sql.split("\n").pop()).to.equal("GROUP BY T.A, T.B");
  });

  it("groups plain projections filtered by an aggregate", () => {
    expect(needsGrouping([plain("T.A", "A")], ["SUM(T.X) > 1"])).to.equal(true);
    expect(needsGrouping([plain("T.A", "A")])).to.equal(false);
  });

  it("refuses an empty select list", () => {
    expect(() =>
      emit({ from: { table: "T", alias: "T" }, joins: [], projections: [], filters: [], having: [] })
    ).to.throw(InvalidRequestError, "Nothing to select");
  });
});
