import { describe, it, expect } from "vitest";
import { assembleRecord, extractExpenseFields, textPattern } from "./index";

const SUMMARY =
  "Custom 10-Legal Entity : ACME$1\nCurrency : USD\nAmount Due Employee : USD 1,234.56\n" +
  "Amount Due Company Card : (200.00)\nTotal Paid By Company : 1.034,56";

describe("extractExpenseFields", () => {
  it("extracts and normalizes every summary field", () => {
    expect(extractExpenseFields(SUMMARY)).toEqual({
      legal_entity: "ACME$1",
      currency: "USD",
      amount_due_employee: 1234.56,
      amount_due_company_card: -200,
      total_paid_by_company: 1034.56,
    });
  });

  it("reads values that extraction placed on the line after each label", () => {
    const text =
      "Custom 10-Legal Entity :\nACME$1\nCurrency :\nUSD\nAmount Due Employee :\nUSD 1,234.56\n" +
      "Amount Due Company Card:\n(200.00)\nTotal Paid By Company :\n1.034,56";
    expect(extractExpenseFields(text)).toEqual({
      legal_entity: "ACME$1",
      currency: "USD",
      amount_due_employee: 1234.56,
      amount_due_company_card: -200,
      total_paid_by_company: 1034.56,
    });
  });

  it("leaves missing or malformed fields null without affecting the others", () => {
    const text = "Currency : Euro\nAmount Due Employee : n/a\nTotal Paid By Company : 12,00";
    expect(extractExpenseFields(text)).toEqual({
      legal_entity: null,
      currency: "Euro",
      amount_due_employee: null,
      amount_due_company_card: null,
      total_paid_by_company: 1200,
    });
  });

  it("uses only the patterns it is given", () => {
    const fields = extractExpenseFields(SUMMARY, [textPattern("currency", "Currency", "free-text")]);
    expect(fields.currency).toBe("USD");
    expect(fields.legal_entity).toBeNull();
    expect(fields.amount_due_employee).toBeNull();
  });
});

describe("assembleRecord", () => {
  it("tags the fields with the source name and freezes the record", () => {
    const record = assembleRecord("report-01.pdf", SUMMARY);
    expect(record.source_name).toBe("report-01.pdf");
    expect(record.total_paid_by_company).toBe(1034.56);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("builds an all-null record from text without labels", () => {
    expect(assembleRecord("blank.pdf", "")).toEqual({
      source_name: "blank.pdf",
      legal_entity: null,
      currency: null,
      amount_due_employee: null,
      amount_due_company_card: null,
      total_paid_by_company: null,
    });
  });
});
