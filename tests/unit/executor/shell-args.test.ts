import {
  buildShellArgs,
  isFullScreenTui,
  isSimpleCommand,
  splitCommandArgs,
} from "../../../src/executor/shellArgs.js";

describe("isSimpleCommand()", () => {
  test("plain commands with arguments are simple", () => {
    expect(isSimpleCommand("ls -la /var/log")).toBe(true);
    expect(isSimpleCommand('grep -n "needle" notes.txt')).toBe(true);
  });

  test.each(["ls | wc -l", "echo hi > out", "sleep 1 &", "a; b", "echo $HOME", "echo `date`", "ls *.ts", "cd ~"])(
    "%s needs a shell",
    (command) => {
      expect(isSimpleCommand(command)).toBe(false);
    }
  );

  test.each([
    ["a newline", "git add .\ngit commit -m x"],
    ["a carriage return", "echo one\r\necho two"],
    ["a comment", "echo hi # greeting"],
    ["brace expansion", "echo {a,b}"],
    ["a brace group", "{ echo a; }"],
    ["history expansion", "echo !!"],
  ])("commands with %s need a shell", (_label, command) => {
    expect(isSimpleCommand(command)).toBe(false);
  });
});

describe("splitCommandArgs()", () => {
  test("splits on whitespace", () => {
    expect(splitCommandArgs("git   log  --oneline")).toEqual(["git", "log", "--oneline"]);
  });

  test("keeps quoted words together", () => {
    expect(splitCommandArgs(`grep "two words" 'and more' file`)).toEqual(["grep", "two words", "and more", "file"]);
  });

  test("keeps empty quoted arguments", () => {
    expect(splitCommandArgs(`printf '' x`)).toEqual(["printf", "", "x"]);
  });

  test("joins adjacent quoted and bare parts", () => {
    expect(splitCommandArgs(`echo pre"fix"'ed'`)).toEqual(["echo", "prefixed"]);
  });

  test("handles backslash escapes", () => {
    expect(splitCommandArgs("touch my\\ file")).toEqual(["touch", "my file"]);
    expect(splitCommandArgs(`echo "say \\"hi\\""`)).toEqual(["echo", 'say "hi"']);
  });

  test("keeps backslashes literally inside single quotes", () => {
    expect(splitCommandArgs(`echo 'a\\b'`)).toEqual(["echo", "a\\b"]);
  });

  test("returns null for unbalanced quotes", () => {
    expect(splitCommandArgs(`echo "open`)).toBeNull();
    expect(splitCommandArgs(`echo 'open`)).toBeNull();
    expect(splitCommandArgs("echo trailing\\")).toBeNull();
  });

  test("returns an empty list for blank input", () => {
    expect(splitCommandArgs("   ")).toEqual([]);
  });
});

describe("isFullScreenTui()", () => {
  test.each(["htop", "top", "vim notes.txt", "vi x", "nvim .", "emacs init.el", "nano a", "less log", "git log | more"])(
    "%s is full-screen",
    (command) => {
      expect(isFullScreenTui(command)).toBe(true);
    }
  );

  test("matches whole words only", () => {
    expect(isFullScreenTui("echo topless")).toBe(false);
    expect(isFullScreenTui("cat unless.txt")).toBe(false);
    expect(isFullScreenTui("ls -la")).toBe(false);
  });
});

describe("buildShellArgs()", () => {
  test("runs the configured shell with -c", () => {
    expect(buildShellArgs("ls | wc -l", "/bin/zsh", "linux")).toEqual({ shell: "/bin/zsh", args: ["-c", "ls | wc -l"] });
  });

  test("falls back to bash when no shell is configured", () => {
    expect(buildShellArgs("ls", "  ", "darwin")).toEqual({ shell: "bash", args: ["-c", "ls"] });
  });

  test("uses Git Bash on Windows", () => {
    expect(buildShellArgs("ls", "bash", "win32")).toEqual({
      shell: "C:/Program Files/Git/bin/bash.exe",
      args: ["-c", "ls"],
    });
  });
});
