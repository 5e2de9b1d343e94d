import { expect } from "chai";
import { AmbiguousAggregationError, InvalidRequestError, SubstitutionError } from "../src/errors";
import { getField, getTable } from "../src/semanticModel";
import {
  compileFilter,
  f,
  nextDay,
  projectField,
  renderExpression,
  renderLiteral,
  resolveBindingsInFilter,
  resolveTimeWindow,
  substitute,
} from "../src/substitution";
import { fixtureModel } from "./helpers";

describe("expression substitution", () => {
  const model = fixtureModel();
  const orders = getTable(model, "ORDERS");
  const customers = getTable(model, "CUSTOMERS");

  describe("renderExpression", () => {
    it("qualifies bare columns and leaves function names alone", () => {
      expect(renderExpression("sum(amount * (1 - discount))", "ORDERS")).to.equal(
        "SUM(ORDERS.AMOUNT * (1 - ORDERS.DISCOUNT))"
      );
    });

    it("does not qualify keywords, cast targets or literals", () => {
      expect(renderExpression("cast(o_orderdate as date)", "ORDERS")).to.equal("CAST(ORDERS.O_ORDERDATE AS DATE)");
      expect(renderExpression("o_status = 'o_status'", "ORDERS")).to.equal("ORDERS.O_STATUS = 'o_status'");
      expect(renderExpression('amount::varchar || "Label"', "T")).to.equal('T.AMOUNT::VARCHAR || T."Label"');
    });

    it("qualifies columns named like non-reserved type or frame words", () => {
      expect(renderExpression("date", "A")).to.equal("A.DATE");
      expect(renderExpression("first || last", "A")).to.equal("A.FIRST || A.LAST");
      expect(renderExpression("date '2024-01-01' <= date", "A")).to.equal("DATE '2024-01-01' <= A.DATE");
    });

    it("keeps frame words bare inside a window clause", () => {
      expect(
        renderExpression(
          "sum(amount) over (partition by region order by day rows between unbounded preceding and current row)",
          "T"
        )
      ).to.equal(
        "SUM(T.AMOUNT) OVER (PARTITION BY T.REGION ORDER BY T.DAY ROWS BETWEEN UNBOUNDED PRECEDING AND CURRENT ROW)"
      );
      expect(renderExpression("row + 1", "T")).to.equal("T.ROW + 1");
    });

    it("leaves already-qualified references alone", () => {
      expect(renderExpression("c.name", "X")).to.equal("C.NAME");
    });
  });

  describe("literals", () => {
    it("renders each primitive", () => {
      expect(renderLiteral(new Date(Date.UTC(2024, 0, 5)))).to.equal("'2024-01-05'");
      expect(renderLiteral("O'Brien")).to.equal("'O''Brien'");
      expect(renderLiteral(42)).to.equal("42");
      expect(renderLiteral(-0.5)).to.equal("-0.5");
      expect(renderLiteral(false)).to.equal("FALSE");
    });

    it("refuses values with no SQL form", () => {
      expect(() => renderLiteral(Number.NaN)).to.throw(InvalidRequestError);
      expect(() => renderLiteral(new Date("not a date"))).to.throw(InvalidRequestError);
    });
  });

  describe("substitute", () => {
    it("fills placeholders and bindings but not string literals or casts", () => {
      const sql = substitute(
        "SELECT * FROM {{orders}} WHERE note = ':start_date' AND d >= :start_date AND x::date > 1",
        { start_date: "2024-01-01" },
        model
      );
      expect(sql).to.equal(
        "SELECT * FROM SALES_DB.PUBLIC.ORDERS WHERE note = ':start_date' AND d >= '2024-01-01' AND x::date > 1"
      );
    });

    it("names the missing binding", () => {
      try {
        substitute("SELECT 1 LIMIT :limit", {}, model);
        expect.fail("expected SubstitutionError");
      } catch (err) {
        expect(err).to.be.instanceOf(SubstitutionError);
        if (!(err instanceof SubstitutionError)) return;
        expect(err.binding).to.equal("limit");
        expect(err.message).to.equal("Missing binding ':limit'");
      }
    });
  });

  describe("filters", () => {
    it("compiles nested trees with bindings", () => {
      const node = f.and(
        f.eq("region", "EMEA"),
        f.and(f.gt("amount", 10), f.raw("a = b OR c = d")),
        f.between("d", ":start_date", ":end_date")
      );
      expect(compileFilter(node, { bindings: { start_date: "2024-01-01", end_date: "2024-01-31" } })).to.equal(
        "region = 'EMEA' AND (amount > 10 AND (a = b OR c = d)) AND d BETWEEN '2024-01-01' AND '2024-01-31'"
      );
    });

    it("treats colon-prefixed values as literals when no bindings are given", () => {
      expect(compileFilter(f.eq("status", ":)"))).to.equal("status = ':)'");
      expect(compileFilter(f.ne("note", ":start_date"))).to.equal("note <> ':start_date'");
    });

    it("compiles an empty conjunction to TRUE", () => {
      expect(compileFilter(f.and())).to.equal("TRUE");
      expect(compileFilter(f.and(f.lte("x", 1)))).to.equal("x <= 1");
    });

    it("fails on unbound values", () => {
      expect(() => resolveBindingsInFilter(f.gte("d", ":start_date"), {})).to.throw(
        SubstitutionError,
        "Missing binding ':start_date'"
      );
      expect(resolveBindingsInFilter(null, {})).to.equal(null);
    });
  });

  describe("nextDay", () => {
    it("crosses month and leap-day boundaries", () => {
      expect(nextDay("2024-03-31")).to.equal("2024-04-01");
      expect(nextDay("2024-02-28")).to.equal("2024-02-29");
    });
  });

  describe("projectField", () => {
    it("applies a fact's default aggregation", () => {
      expect(projectField(model, { field: getField(orders, "AMOUNT") })).to.deep.equal({
        expr: "SUM(ORDERS.O_TOTALPRICE)",
        alias: "AMOUNT",
        aggregate: true,
        table: "ORDERS",
      });
    });

    it("uses an explicit aggregation over the default", () => {
      const projection = projectField(model, { field: getField(orders, "AMOUNT"), aggregation: "avg" });
      expect(projection.expr).to.equal("AVG(ORDERS.O_TOTALPRICE)");
      expect(projection.alias).to.equal("AVG_AMOUNT");
    });

    it("refuses a bare fact without a default aggregation", () => {
      try {
        projectField(model, { field: getField(orders, "DISCOUNT") });
        expect.fail("expected AmbiguousAggregationError");
      } catch (err) {
        expect(err).to.be.instanceOf(AmbiguousAggregationError);
        if (!(err instanceof AmbiguousAggregationError)) return;
        expect(err.fact).to.equal("DISCOUNT");
        expect(err.message).to.equal(
          'Fact "ORDERS.DISCOUNT" is used outside an aggregation and declares no default_aggregation'
        );
      }
    });

    it("checks aggregation against the field type", () => {
      expect(() => projectField(model, { field: getField(orders, "STATUS"), aggregation: "sum" })).to.throw(
        InvalidRequestError,
        'Cannot apply sum to text field "ORDERS.STATUS"'
      );
      expect(projectField(model, { field: getField(orders, "STATUS"), aggregation: "count" }).expr).to.equal(
        "COUNT(ORDERS.O_STATUS)"
      );
    });

    it("projects metrics as they are and dimensions plainly", () => {
      expect(projectField(model, { field: getField(orders, "ORDER_COUNT") })).to.deep.equal({
        expr: "COUNT(DISTINCT ORDERS.ORDER_ID)",
        alias: "ORDER_COUNT",
        aggregate: true,
        table: "ORDERS",
      });
      expect(() => projectField(model, { field: getField(orders, "ORDER_COUNT"), aggregation: "sum" })).to.throw(
        InvalidRequestError
      );
      expect(
        projectField(model, { field: getField(customers, "SEGMENT"), aliasPrefix: "CUSTOMERS" })
      ).to.deep.equal({
        expr: "CUSTOMERS.C_MKTSEGMENT",
        alias: "CUSTOMERS_SEGMENT",
        aggregate: false,
        table: "CUSTOMERS",
      });
    });
  });

  describe("resolveTimeWindow", () => {
    const today = new Date("2024-03-31T12:00:00Z");

    it("prefers the request's range", () => {
      expect(resolveTimeWindow({ start: "2024-01-01", end: "2024-01-31" }, { lookbackDays: 30, today })).to.deep.equal(
        { start: "2024-01-01", end: "2024-01-31", source: "request" }
      );
    });

    it("falls back to a lookback window ending today", () => {
      expect(resolveTimeWindow(undefined, { lookbackDays: 30, today })).to.deep.equal({
        start: "2024-03-01",
        end: "2024-03-31",
        source: "default",
      });
    });

    it("returns null when the lookback is disabled", () => {
      expect(resolveTimeWindow(undefined, { lookbackDays: 0, today })).to.equal(null);
    });
  });
});
