import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../src/config";
import { loadMarkup } from "../src/markup";
import {
  breadcrumbTail,
  findAccessLevel,
  findDescription,
  findMethodName,
  findTitle,
  locateCodeBlock,
  locateSection,
} from "../src/structure-locator";

const { labels, headingTags, breadcrumb } = DEFAULT_CONFIG;

describe("locateSection", () => {
  it("finds a heading at any configured level and the table after it", () => {
    for (const tag of ["h3", "h4", "h5"]) {
      const root = loadMarkup(
        `<${tag}>Параметры запроса</${tag}><p>Все параметры</p><table><tr><td>x</td></tr></table>`,
      );
      const section = locateSection(root, labels.requestParameters, headingTags);

      expect(section?.heading.tag).toBe(tag);
      expect(section?.table?.text()).toBe("x");
    }
  });

  it("finds a table wrapped in a container", () => {
    const root = loadMarkup(
      `<h4>Request parameters</h4><div class="scroll"><table><tr><td>y</td></tr></table></div>`,
    );

    expect(
      locateSection(root, labels.requestParameters, headingTags)?.table?.text(),
    ).toBe("y");
  });

  it("does not cross into the next section", () => {
    const root = loadMarkup(
      `<h3>Параметры запроса</h3><p>Нет параметров</p><h3>Параметры ответа</h3><table><tr><td>z</td></tr></table>`,
    );
    const section = locateSection(root, labels.requestParameters, headingTags);

    expect(section).toBeDefined();
    expect(section?.table).toBeUndefined();
  });

  it("ignores headings at other levels and partial matches", () => {
    const root = loadMarkup(
      `<h2>Параметры запроса</h2><h3>Параметры запроса (устарело)</h3>`,
    );

    expect(
      locateSection(root, labels.requestParameters, headingTags),
    ).toBeUndefined();
  });
});

describe("locateCodeBlock", () => {
  it("returns the code text after the heading", () => {
    const root = loadMarkup(
      `<h3>Пример запроса</h3><pre><code>{"id": 1}</code></pre>`,
    );

    expect(locateCodeBlock(root, labels.requestExample, headingTags)).toBe(
      '{"id": 1}',
    );
  });
});

describe("method info", () => {
  const info = `
    <h1>Получение пользователя</h1>
    <table>
      <tr><th>Метод:</th><td><code>"get.user"</code></td></tr>
      <tr><td>Кому доступен</td><td>Администратор,  агент</td></tr>
      <tr><td>Описание</td><td>Возвращает данные пользователя</td></tr>
    </table>`;

  it("reads labelled cells", () => {
    const root = loadMarkup(info);

    expect(findMethodName(root, labels.method)).toBe("get.user");
    expect(findAccessLevel(root, labels.accessLevel)).toBe(
      "Администратор, агент",
    );
    expect(findDescription(root, DEFAULT_CONFIG)).toBe(
      "Возвращает данные пользователя",
    );
    expect(findTitle(root)).toBe("Получение пользователя");
  });

  it("falls back to a method-like code span in a table", () => {
    const root = loadMarkup(
      `<p><code>not.this</code></p><table><tr><td>Вызов</td><td><code>create.call</code></td></tr></table>`,
    );

    expect(findMethodName(root, labels.method)).toBe("create.call");
  });

  it("returns undefined without a method name", () => {
    const root = loadMarkup(`<table><tr><td>id</td><td>number</td></tr></table>`);

    expect(findMethodName(root, labels.method)).toBeUndefined();
    expect(findAccessLevel(root, labels.accessLevel)).toBeUndefined();
  });
});

describe("breadcrumbTail", () => {
  it("takes the last list item", () => {
    const root = loadMarkup(
      `<nav aria-label="breadcrumb"><ol><li>Главная</li><li>Пользователи</li><li>Получение пользователя</li></ol></nav>`,
    );

    expect(breadcrumbTail(root, breadcrumb)).toBe("Получение пользователя");
  });

  it("splits a plain text trail", () => {
    const root = loadMarkup(
      `<div class="md-path">Docs / Users › Create user</div>`,
    );

    expect(breadcrumbTail(root, breadcrumb)).toBe("Create user");
  });

  it("rejects generic tails and long trails", () => {
    const generic = loadMarkup(
      `<ol class="breadcrumb"><li>Главная</li><li>API</li></ol>`,
    );
    const long = loadMarkup(
      `<ol class="breadcrumb"><li>Главная</li><li>Получение пользователя</li></ol>`,
    );

    expect(breadcrumbTail(generic, breadcrumb)).toBeUndefined();
    expect(
      breadcrumbTail(long, { ...breadcrumb, maxLength: 20 }),
    ).toBeUndefined();
  });

  it("feeds the description when no labelled cell exists", () => {
    const root = loadMarkup(
      `<h1>Title</h1><ol class="breadcrumb"><li>Home</li><li>Users</li></ol>`,
    );

    expect(findDescription(root, DEFAULT_CONFIG)).toBe("Users");
  });

  it("leaves the title as the last description fallback", () => {
    const root = loadMarkup(`<h1>Title</h1>`);

    expect(findDescription(root, DEFAULT_CONFIG)).toBe("Title");
  });
});
