import assert from "node:assert";
import { code, renderTable } from "../src/markdown.js";

describe("renderTable", () => {
  it("renders header, separator and rows", () => {
    assert.equal(
      renderTable(["A", "B"], [["1", "2"], ["3", "4"]]),
      "| A | B |\n| --- | --- |\n| 1 | 2 |\n| 3 | 4 |",
    );
  });

  it("renders a header-only table", () => {
    assert.equal(renderTable(["Only"], []), "| Only |\n| --- |");
  });

  it("escapes pipes and newlines inside cells", () => {
    assert.equal(
      renderTable(["X", "Y"], [["a|b", "line1\nline2"]]).split("\n")[2],
      "| a\\|b | line1<br>line2 |",
    );
  });

  it("rejects rows of the wrong width", () => {
    assert.throws(() => renderTable(["A", "B"], [["1", "2"], ["3"]]), /Row 2 has 1 cells, expected 2/);
  });

  it("rejects a table without columns", () => {
    assert.throws(() => renderTable([], []), /at least one column/);
  });
});

describe("code", () => {
  it("wraps plain text in single backticks", () => {
    assert.equal(code("SELECT 1;"), "`SELECT 1;`");
  });

  it("uses double backticks when the text has one", () => {
    assert.equal(code("a`b"), "`` a`b ``");
  });
});
