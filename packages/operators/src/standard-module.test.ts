import { describe, it } from "mocha";
import { expect } from "chai";
import { createEntityCatalog } from "@generis/core";
import { createDispatchEngine, silentLogger } from "@generis/engine";
import { SimpleEntry } from "./add.js";
import { standardModule } from "./standard-module.js";

describe("standardModule", () => {
  it("should order operators by registration within their dependencies", () => {
    const engine = createDispatchEngine({ modules: [standardModule()], logger: silentLogger });
    expect(engine.signatures.map((signature) => signature.entity.id)).to.deep.equal([
      "SizeOfCollection",
      "SizeOfMap",
      "SizeOfArray",
      "SizeOfIterable",
      "SizeOfIterator",
      "GetArrayElementType",
      "GetIterableElementType",
      "GetIteratorElementType",
      "GetMapElementType",
      "NopConverter",
      "IterableToIterator",
      "DefaultToListConverter",
      "DefaultToArrayConverter",
      "AddToCollection",
      "AddEntryToMap",
      "AddAllFromIterable",
      "ConvertingCopier",
      "MapCopier",
      "BeanToMapCopier",
      "BeanCopier",
      "DefaultImmutableChecker",
    ]);
  });

  it("should declare map entries to the catalog", () => {
    const engine = createDispatchEngine({ modules: [standardModule()], logger: silentLogger });
    expect(engine.catalog.entityOf(new SimpleEntry("a", 1))?.id).to.equal("SimpleEntry");
  });

  it("should assemble twice over one catalog", () => {
    const catalog = createEntityCatalog();
    createDispatchEngine({ modules: [standardModule()], catalog, logger: silentLogger });
    const second = createDispatchEngine({ modules: [standardModule()], catalog, logger: silentLogger });
    expect(second.operators).to.have.length(21);
  });
});
