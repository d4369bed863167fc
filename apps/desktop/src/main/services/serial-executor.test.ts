import { SerialExecutor } from "./serial-executor";

const assertEqual = <T>(actual: T, expected: T, message: string): void => {
  if (actual !== expected) {
    throw new Error(`${message}: expected "${String(expected)}", got "${String(actual)}"`);
  }
};

const wait = async (ms: number): Promise<void> => {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
};

await (async () => {
  const executor = new SerialExecutor();
  const trace: string[] = [];
  let running = 0;
  let maxRunning = 0;

  const task = (name: string, ms: number) => async (): Promise<string> => {
    running += 1;
    maxRunning = Math.max(maxRunning, running);
    trace.push(`start:${name}`);
    await wait(ms);
    trace.push(`end:${name}`);
    running -= 1;
    return name;
  };

  const results = await Promise.all([
    executor.run(task("a", 30)),
    executor.run(task("b", 5)),
    executor.run(task("c", 0))
  ]);

  assertEqual(results.join(","), "a,b,c", "results map to their tasks");
  assertEqual(maxRunning, 1, "tasks never overlap");
  assertEqual(trace.join(","), "start:a,end:a,start:b,end:b,start:c,end:c", "tasks run in submission order");
})();

await (async () => {
  const executor = new SerialExecutor();
  let failure = "";
  try {
    await executor.run(async () => {
      throw new Error("boom");
    });
  } catch (error) {
    failure = error instanceof Error ? error.message : String(error);
  }
  assertEqual(failure, "boom", "task errors reach the caller");
  assertEqual(await executor.run(async () => "next"), "next", "a failed task does not block the queue");
})();
