import { assert, describe, test } from "@launchdeck/testkit";
import {
  desktopEntryCommand,
  isLaunchableEntry,
  parseDesktopEntry,
  stripFieldCodes,
} from "../loader/desktopEntry.js";

const EDITOR = [
  "# comment",
  "[Desktop Entry]",
  "Type=Application",
  "Name=Text Editor",
  "Name[de]=Texteditor",
  "Exec=gedit %U",
  "Icon=accessories-text-editor",
  "",
  "[Desktop Action new-window]",
  "Name=New Window",
  "Exec=gedit --new-window",
].join("\n");

describe("parseDesktopEntry", () => {
  test("reads the main group only", () => {
    assert.deepEqual(parseDesktopEntry(EDITOR), {
      name: "Text Editor",
      exec: "gedit %U",
      icon: "accessories-text-editor",
      type: "Application",
      noDisplay: false,
      hidden: false,
      terminal: false,
    });
  });

  test("reads boolean flags", () => {
    const entry = parseDesktopEntry(
      "[Desktop Entry]\nType=Application\nName=Top\nExec=top\nTerminal=true\nNoDisplay=True\n",
    );
    assert.equal(entry?.terminal, true);
    assert.equal(entry?.noDisplay, true);
    assert.equal(entry?.hidden, false);
  });

  test("returns null without a main group or a name", () => {
    assert.equal(parseDesktopEntry("Name=Loose\nExec=loose\n"), null);
    assert.equal(parseDesktopEntry("[Desktop Entry]\nExec=nameless\n"), null);
  });
});

describe("isLaunchableEntry", () => {
  test("keeps visible applications with an Exec line", () => {
    const entry = parseDesktopEntry(EDITOR);
    assert.ok(entry !== null && isLaunchableEntry(entry));
  });

  test("drops hidden, non-application and Exec-less entries", () => {
    const cases = [
      "[Desktop Entry]\nType=Application\nName=A\nExec=a\nNoDisplay=true\n",
      "[Desktop Entry]\nType=Application\nName=B\nExec=b\nHidden=true\n",
      "[Desktop Entry]\nType=Link\nName=C\nURL=https://example.invalid\n",
      "[Desktop Entry]\nName=D\nExec=d\n",
      "[Desktop Entry]\nType=Application\nName=E\n",
    ];
    for (const text of cases) {
      const entry = parseDesktopEntry(text);
      assert.ok(entry !== null);
      assert.equal(entry !== null && isLaunchableEntry(entry), false, text);
    }
  });
});

describe("desktopEntryCommand", () => {
  test("strips field codes and keeps literal percent signs", () => {
    assert.equal(stripFieldCodes("gimp-2.10 %U"), "gimp-2.10");
    assert.equal(stripFieldCodes("app --icon %i --name %c %f"), "app --icon --name");
    assert.equal(stripFieldCodes("printf 100%% %u"), "printf 100%");
  });

  test("wraps terminal applications", () => {
    const entry = parseDesktopEntry(
      "[Desktop Entry]\nType=Application\nName=Top\nExec=htop %F\nTerminal=true\n",
    );
    assert.ok(entry !== null);
    if (entry === null) return;
    assert.equal(desktopEntryCommand(entry, "kitty"), "kitty -e htop");
  });

  test("returns null when nothing but field codes remain", () => {
    const entry = parseDesktopEntry("[Desktop Entry]\nType=Application\nName=X\nExec=%U\n");
    assert.ok(entry !== null);
    if (entry === null) return;
    assert.equal(desktopEntryCommand(entry, "xterm"), null);
  });
});
