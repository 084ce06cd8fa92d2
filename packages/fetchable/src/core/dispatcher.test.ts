import { describe, it, expect, vi } from "vitest";
import { createDispatcher, lazySequence } from "./dispatcher";
import { DataHandler } from "./dataHandler";
import { rendererRegistry } from "./renderers";
import { textTarget } from "./textTarget";
import { InvalidItemCountError, SequenceIndexError } from "../errors";

function setup() {
  const renderers = rendererRegistry<string>();
  const dispatcher = createDispatcher({ target: textTarget, renderers });
  return { renderers, dispatcher };
}

describe("createDispatcher", () => {
  describe("resolve", () => {
    it("should render the success branch with the payload", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler([1, 2]);

      const result = dispatcher.resolve(handler, {
        onSuccess: (items) => `${items.length} items`,
      });

      expect(result).toBe("2 items");
    });

    it("should prefer per-call branches", () => {
      const { dispatcher, renderers } = setup();
      renderers.setAll({
        loading: () => "global loading",
        error: () => "global error",
        empty: () => "global empty",
      });
      const handler = new DataHandler<number>();
      const branches = {
        onLoading: () => "local loading",
        onError: (message: string) => `local error: ${message}`,
        onEmpty: (message: string) => `local empty: ${message}`,
      };

      handler.startLoading();
      expect(dispatcher.resolve(handler, branches)).toBe("local loading");

      handler.fail("boom");
      expect(dispatcher.resolve(handler, branches)).toBe("local error: boom");

      handler.setEmpty("none");
      expect(dispatcher.resolve(handler, branches)).toBe("local empty: none");
    });

    it("should fall back to the registry", () => {
      const { dispatcher, renderers } = setup();
      renderers.setError((message) => `global error: ${message}`);
      const handler = new DataHandler<number>();
      handler.fail("boom");

      const result = dispatcher.resolve(
        handler,
        { onError: undefined },
        { useGlobalFallback: true }
      );

      expect(result).toBe("global error: boom");
    });

    it("should pass the raw message to the registry empty renderer", () => {
      const { dispatcher, renderers } = setup();
      const empty = vi.fn((message: string) => `[${message}]`);
      renderers.setEmpty(empty);
      const handler = new DataHandler<number>();

      expect(dispatcher.resolve(handler, {})).toBe("[]");
      expect(empty).toHaveBeenCalledWith("");
    });

    it("should skip the registry when useGlobalFallback is false", () => {
      const { dispatcher, renderers } = setup();
      renderers.setAll({
        loading: () => "global loading",
        error: () => "global error",
        empty: () => "global empty",
      });
      const handler = new DataHandler<number>();
      const options = { useGlobalFallback: false };

      handler.startLoading();
      expect(dispatcher.resolve(handler, {}, options)).toBe("Loading...");

      handler.fail("boom");
      expect(dispatcher.resolve(handler, {}, options)).toBe("boom");

      handler.setEmpty("Nothing yet");
      expect(dispatcher.resolve(handler, {}, options)).toBe("Nothing yet");
    });

    it("should use built-in defaults without registry renderers", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler<number>();

      expect(dispatcher.resolve(handler, {})).toBe("No data available");

      handler.setEmpty("   ");
      expect(dispatcher.resolve(handler, {})).toBe("No data available");

      handler.startLoading();
      expect(dispatcher.resolve(handler, {})).toBe("Loading...");
    });

    it("should work without a registry", () => {
      const dispatcher = createDispatcher({ target: textTarget });
      const handler = new DataHandler<number>();
      handler.fail("boom");

      expect(dispatcher.resolve(handler, {})).toBe("boom");
      expect(dispatcher.renderers).toBeUndefined();
    });

    it("should render nothing in success without a success branch", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler(1);

      expect(dispatcher.resolve(handler, {})).toBe("");
    });

    it("should never call onSuccess without a payload", () => {
      const { dispatcher } = setup();
      const onSuccess = vi.fn(() => "value");
      const source = {
        state: "success" as const,
        data: undefined,
        errorMessage: "",
      };

      expect(dispatcher.resolve(source, { onSuccess })).toBe("");
      expect(onSuccess).not.toHaveBeenCalled();
    });

    it("should treat a null payload as absent", () => {
      const { dispatcher } = setup();
      const onSuccess = vi.fn((value: string | null) => `got ${value}`);
      const source = {
        state: "success" as const,
        data: null,
        errorMessage: "",
      };

      expect(dispatcher.resolve<string | null>(source, { onSuccess })).toBe("");
      expect(onSuccess).not.toHaveBeenCalled();
    });

    it("should render the empty state for a handler built with null", () => {
      const { dispatcher } = setup();
      const onSuccess = vi.fn((value: string | null) => `got ${value}`);
      const handler = new DataHandler<string | null>(null);

      expect(dispatcher.resolve(handler, { onSuccess })).toBe(
        "No data available"
      );
      expect(onSuccess).not.toHaveBeenCalled();
    });

    it("should render nothing after succeeding with null", () => {
      const { dispatcher } = setup();
      const onSuccess = vi.fn((value: string | null) => `got ${value}`);
      const handler = new DataHandler<string | null>();

      handler.succeed(null);

      expect(dispatcher.resolve(handler, { onSuccess })).toBe("");
      expect(onSuccess).not.toHaveBeenCalled();
    });

    it("should bypass the state when disabled and a payload is present", () => {
      const { dispatcher } = setup();
      const source = {
        state: "loading" as const,
        data: "kept",
        errorMessage: "",
      };

      const result = dispatcher.resolve(
        source,
        { onSuccess: (data) => `success: ${data}`, onLoading: () => "loading" },
        { enabled: false }
      );

      expect(result).toBe("success: kept");
    });

    it("should render nothing when disabled without a success branch", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler(1);

      expect(dispatcher.resolve(handler, {}, { enabled: false })).toBe("");
    });

    it("should follow the state when disabled without a payload", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler<number>();
      handler.fail("boom");

      expect(dispatcher.resolve(handler, {}, { enabled: false })).toBe("boom");
    });

    it("should follow the state when disabled with a null payload", () => {
      const { dispatcher } = setup();
      const source = {
        state: "loading" as const,
        data: null,
        errorMessage: "",
      };

      const result = dispatcher.resolve<string | null>(
        source,
        { onSuccess: () => "success", onLoading: () => "loading" },
        { enabled: false }
      );

      expect(result).toBe("loading");
    });
  });

  describe("resolveList", () => {
    it("should prefer onEmptyList for an empty payload", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler<string[]>([]);
      const onEmpty = vi.fn(() => "empty");

      const result = dispatcher.resolveList(handler, {
        onSuccess: () => "list",
        onEmptyList: () => "empty list",
        onEmpty,
      });

      expect(result).toBe("empty list");
      expect(onEmpty).not.toHaveBeenCalled();
      expect(handler.state).toBe("success");
    });

    it("should pass the empty-list message", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler<string[]>([]);

      const result = dispatcher.resolveList(handler, {
        emptyListMessage: "No posts yet",
        onEmptyList: (message) => `(${message})`,
      });

      expect(result).toBe("(No posts yet)");
    });

    it("should fall through to onEmpty without onEmptyList", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler<string[]>([]);

      const result = dispatcher.resolveList(handler, {
        emptyListMessage: "No posts yet",
        onEmpty: (message) => `empty: ${message}`,
      });

      expect(result).toBe("empty: No posts yet");
    });

    it("should use the registry and then the default for empty lists", () => {
      const { dispatcher, renderers } = setup();
      const handler = new DataHandler<string[]>([]);

      expect(dispatcher.resolveList(handler, {})).toBe("No data available");

      renderers.setEmpty((message) => `global: ${message}`);
      expect(
        dispatcher.resolveList(handler, { emptyListMessage: "No posts" })
      ).toBe("global: No posts");
    });

    it("should render non-empty lists with onSuccess", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler(["a", "b"]);

      const result = dispatcher.resolveList(handler, {
        onSuccess: (items) => items.join(","),
        onEmptyList: () => "empty list",
      });

      expect(result).toBe("a,b");
    });

    it("should render empty lists with onSuccess when disabled", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler<string[]>([]);

      const result = dispatcher.resolveList(
        handler,
        { onSuccess: (items) => `${items.length}`, onEmptyList: () => "empty" },
        { enabled: false }
      );

      expect(result).toBe("0");
    });

    it("should resolve other states like resolve()", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler<string[]>();
      handler.fail("boom");

      expect(dispatcher.resolveList(handler, {})).toBe("boom");
    });
  });

  describe("resolveSequence", () => {
    it("should build items lazily", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler(["a", "b", "c"]);
      const itemBuilder = vi.fn(
        (items: string[], index: number) => `${index}:${items[index]}`
      );

      const sequence = dispatcher.resolveSequence(handler, { itemBuilder });

      expect(sequence.length).toBe(3);
      expect(itemBuilder).not.toHaveBeenCalled();

      expect(sequence.at(1)).toBe("1:b");
      expect(itemBuilder).toHaveBeenCalledTimes(1);

      expect([...sequence]).toEqual(["0:a", "1:b", "2:c"]);
    });

    it("should read the payload without copying it", () => {
      const { dispatcher } = setup();
      const items = ["a"];
      const handler = new DataHandler(items);
      let seen: string[] | undefined;

      const sequence = dispatcher.resolveSequence(handler, {
        itemBuilder: (data) => {
          seen = data;
          return "";
        },
      });
      sequence.at(0);

      expect(seen).toBe(items);
    });

    it("should accept a fixed or computed item count", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler({ total: 5 });

      const fixed = dispatcher.resolveSequence(handler, {
        itemCount: 2,
        itemBuilder: (_, index) => `#${index}`,
      });
      const computed = dispatcher.resolveSequence(handler, {
        itemCount: (data) => data.total,
        itemBuilder: (_, index) => `#${index}`,
      });

      expect([...fixed]).toEqual(["#0", "#1"]);
      expect(computed.length).toBe(5);
    });

    it("should default to one item for non-array payloads", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler({ name: "Ada" });

      const sequence = dispatcher.resolveSequence(handler, {
        itemBuilder: (user) => user.name,
      });

      expect([...sequence]).toEqual(["Ada"]);
    });

    it("should hold a single fallback entry in other states", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler<string[]>();
      const itemBuilder = vi.fn(() => "item");

      handler.startLoading();
      const loading = dispatcher.resolveSequence(handler, { itemBuilder });
      expect([...loading]).toEqual(["Loading..."]);

      handler.fail("boom");
      const failed = dispatcher.resolveSequence(handler, {
        itemBuilder,
        onError: (message) => `error: ${message}`,
      });
      expect([...failed]).toEqual(["error: boom"]);

      expect(itemBuilder).not.toHaveBeenCalled();
    });

    it("should be empty for success without a payload", () => {
      const { dispatcher } = setup();
      const source = {
        state: "success" as const,
        data: undefined,
        errorMessage: "",
      };

      const sequence = dispatcher.resolveSequence<string[]>(source, {
        itemBuilder: () => "item",
      });

      expect(sequence.length).toBe(0);
      expect([...sequence]).toEqual([]);
    });

    it("should be empty for success with a null payload", () => {
      const { dispatcher } = setup();
      const itemBuilder = vi.fn(() => "item");
      const source = {
        state: "success" as const,
        data: null,
        errorMessage: "",
      };

      const sequence = dispatcher.resolveSequence<string[] | null>(source, {
        itemBuilder,
      });

      expect(sequence.length).toBe(0);
      expect(itemBuilder).not.toHaveBeenCalled();
    });

    it("should reject invalid item counts", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler([1]);

      expect(() =>
        dispatcher.resolveSequence(handler, {
          itemCount: -1,
          itemBuilder: () => "",
        })
      ).toThrow(InvalidItemCountError);
      expect(() =>
        dispatcher.resolveSequence(handler, {
          itemCount: 1.5,
          itemBuilder: () => "",
        })
      ).toThrow("itemCount must be a non-negative integer, got 1.5");
    });
  });

  describe("resolveMany", () => {
    it("should return the success list as-is", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler(["a", "b"]);

      const result = dispatcher.resolveMany(handler, {
        onSuccess: (items) => items.map((item) => item.toUpperCase()),
      });

      expect(result).toEqual(["A", "B"]);
    });

    it("should wrap other states in a single entry", () => {
      const { dispatcher, renderers } = setup();
      renderers.setLoading(() => "global loading");
      const handler = new DataHandler<string[]>();

      handler.startLoading();
      expect(dispatcher.resolveMany(handler, {})).toEqual(["global loading"]);

      handler.setEmpty();
      expect(dispatcher.resolveMany(handler, {})).toEqual([
        "No data available",
      ]);
    });

    it("should return an empty list for a null payload", () => {
      const { dispatcher } = setup();
      const onSuccess = vi.fn(() => ["item"]);
      const source = {
        state: "success" as const,
        data: null,
        errorMessage: "",
      };

      expect(dispatcher.resolveMany<string[] | null>(source, { onSuccess })).toEqual(
        []
      );
      expect(onSuccess).not.toHaveBeenCalled();
    });

    it("should return an empty list without a success branch", () => {
      const { dispatcher } = setup();
      const handler = new DataHandler(["a"]);

      expect(dispatcher.resolveMany(handler, {})).toEqual([]);
    });
  });
});

describe("lazySequence", () => {
  it("should throw outside its bounds", () => {
    const sequence = lazySequence(2, (index) => index * 10);

    expect(sequence.at(1)).toBe(10);
    expect(() => sequence.at(2)).toThrow(SequenceIndexError);
    expect(() => sequence.at(-1)).toThrow(
      "Index -1 is out of range for a sequence of length 2"
    );
  });
});
