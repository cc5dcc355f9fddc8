import { describe, it, expect } from "vitest";
import { parseXmlTree, decodeInput } from "./tree.js";
import { buildXml } from "./emit.js";
import type { OutElement } from "./emit.js";
import { ReadError } from "../errors.js";

function out(name: string, attributes: [string, string][] = [], children: OutElement[] = []): OutElement {
  return { name, attributes, children };
}

describe("parseXmlTree", () => {
  it("builds paths with sibling indices", () => {
    const root = parseXmlTree(`<?xml version="1.0"?>
<OpenDRIVE>
  <header revMajor="1" revMinor="7"/>
  <road id="a"/>
  <road id="b"><planView/></road>
</OpenDRIVE>`);
    expect(root.name).toBe("OpenDRIVE");
    expect(root.path).toBe("OpenDRIVE");
    expect(root.children.map((c) => c.path)).toEqual([
      "OpenDRIVE/header[0]",
      "OpenDRIVE/road[0]",
      "OpenDRIVE/road[1]",
    ]);
    expect(root.children[2]?.children[0]?.path).toBe("OpenDRIVE/road[1]/planView[0]");
  });

  it("keeps attribute order and decodes entities", () => {
    const root = parseXmlTree(`<a z="1" b="x &amp; &lt;y&gt;" m="  spaced  "/>`);
    expect([...root.attributes.entries()]).toEqual([
      ["z", "1"],
      ["b", "x & <y>"],
      ["m", "  spaced  "],
    ]);
  });

  it("decodes decimal and hexadecimal character references", () => {
    const root = parseXmlTree(`<a name="Stra&#223;e&#10;x" hex="&#x20AC;&#x1F600;">caf&#xE9;&#9;</a>`);
    expect(root.attributes.get("name")).toBe("Straße\nx");
    expect(root.attributes.get("hex")).toBe("€😀");
    expect(root.text).toBe("café\t");
  });

  it("normalizes literal tabs and line breaks in attribute values", () => {
    const root = parseXmlTree(`<a n="x\ty\r\nz\nw"/>`);
    expect(root.attributes.get("n")).toBe("x y z w");
  });

  it("decodes references only once", () => {
    const root = parseXmlTree(`<a n="&amp;#38;&amp;lt;"/>`);
    expect(root.attributes.get("n")).toBe("&#38;&lt;");
  });

  it("decodes more than a thousand references in one document", () => {
    const items = Array.from({ length: 1200 }, (_, i) => `<i v="&lt;${i}&gt;"/>`).join("");
    const root = parseXmlTree(`<a>${items}</a>`);
    expect(root.children).toHaveLength(1200);
    expect(root.children[1199]?.attributes.get("v")).toBe("<1199>");
  });

  it.each([
    ["a character reference to NUL", `<a><b n="&#0;"/></a>`],
    ["a lone surrogate", `<a><b n="&#xD800;"/></a>`],
    ["an undeclared entity", `<a><b n="&nbsp;"/></a>`],
  ])("rejects %s with the element path", (_, xml) => {
    try {
      parseXmlTree(xml);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ReadError);
      if (!(err instanceof ReadError)) return;
      expect(err.kind).toBe("MalformedXml");
      expect(err.context.path).toBe("a/b[0]");
    }
  });

  it("collects trimmed text and verbatim CDATA", () => {
    const root = parseXmlTree(`<a>
    <geo><![CDATA[+proj=utm +zone=32 ]]></geo>
    <note>  hello  </note>
  </a>`);
    expect(root.text).toBe("");
    expect(root.children[0]?.text).toBe("+proj=utm +zone=32 ");
    expect(root.children[1]?.text).toBe("hello");
  });

  it("reports well-formedness errors with a position", () => {
    try {
      parseXmlTree("<a>\n<b></a>");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ReadError);
      if (!(err instanceof ReadError)) return;
      expect(err.kind).toBe("MalformedXml");
      expect(err.context.line).toBe(2);
    }
  });

  it("rejects documents without a root element", () => {
    expect(() => parseXmlTree("")).toThrow(ReadError);
  });
});

describe("decodeInput", () => {
  it("decodes UTF-8 bytes", () => {
    expect(decodeInput(new TextEncoder().encode("<a n=\"Straße\"/>"))).toBe('<a n="Straße"/>');
  });

  it("strips a byte-order mark", () => {
    expect(decodeInput("\uFEFF<a/>")).toBe("<a/>");
  });

  it("rejects invalid UTF-8", () => {
    expect(() => decodeInput(new Uint8Array([0x3c, 0xff, 0x3e]))).toThrow(ReadError);
  });
});

describe("buildXml", () => {
  it("writes the declaration, indentation and self-closing empty elements", () => {
    const xml = buildXml(out("OpenDRIVE", [], [out("header", [["revMajor", "1"], ["revMinor", "7"]])]));
    expect(xml).toBe(
      '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
        "<OpenDRIVE>\n" +
        '  <header revMajor="1" revMinor="7"/>\n' +
        "</OpenDRIVE>\n",
    );
  });

  it("escapes attribute values", () => {
    const xml = buildXml(out("road", [["name", `A & "B" <C>`]]));
    expect(xml).toContain('<road name="A &amp; &quot;B&quot; &lt;C&gt;"/>');
  });

  it("writes whitespace characters in attribute values as character references", () => {
    const xml = buildXml(out("road", [["name", "a\tb\nc\rd"]]));
    expect(xml).toContain('<road name="a&#9;b&#10;c&#13;d"/>');
    expect(parseXmlTree(xml).attributes.get("name")).toBe("a\tb\nc\rd");
  });

  it("escapes markup in text content", () => {
    const xml = buildXml({ name: "note", attributes: [], children: [], text: "a < b && c > d" });
    expect(xml).toContain("<note>a &lt; b &amp;&amp; c &gt; d</note>");
    expect(parseXmlTree(xml).text).toBe("a < b && c > d");
  });

  it("reads back what it writes", () => {
    const xml = buildXml({
      name: "userData",
      attributes: [["code", "x'y"]],
      children: [out("item", [["k", "v"]])],
      text: "note",
    });
    const root = parseXmlTree(xml);
    expect(root.attributes.get("code")).toBe("x'y");
    expect(root.text).toBe("note");
    expect(root.children[0]?.attributes.get("k")).toBe("v");
  });

  it("writes CDATA content verbatim", () => {
    const xml = buildXml({ name: "geoReference", attributes: [], children: [], cdata: "+proj=merc <x>" });
    expect(parseXmlTree(xml).text).toBe("+proj=merc <x>");
  });
});
