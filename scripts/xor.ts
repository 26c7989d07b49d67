import fs from "node:fs";
import { Dense, Graph, Hyperbolic, Network, SGDTrainer, Sigmoid } from "../structures";
import { createRng } from "../nn";

const numberArg = (name: string, fallback: number): number => {
  const arg = process.argv.find((a) => a.startsWith(`--${name}=`));
  const parsed = arg ? Number(arg.split("=")[1]) : NaN;
  return Number.isFinite(parsed) ? parsed : fallback;
};

const seed = numberArg("seed", 177);
const iterations = numberArg("iterations", 1000);
const rate = numberArg("rate", 0.1);
const writeDot = process.argv.includes("--dot");

// two binary inputs, one target per combination
const inputs = [
  [0, 0],
  [0, 1],
  [1, 0],
  [1, 1]
];
const targets = [[0], [1], [1], [0]];

const rng = createRng(seed);
const network = new Network([
  Dense.random(2, 6, rng), // hidden layer of 6 neurons
  new Hyperbolic(6),
  Dense.random(6, 1, rng), // single output neuron
  new Sigmoid(1) // squash into (0, 1)
]);
console.log(`[setup] seed=${seed} params=${network.parameterCount()}`);

const show = () => {
  inputs.forEach((x, n) => {
    const y = network.output(x);
    console.log(`X: [${x.join(", ")}], Y: [${y.join(", ")}], T: [${targets[n].join(", ")}]`);
  });
};

show();

try {
  const trainer = new SGDTrainer(iterations, rate, { logEvery: 100 });
  trainer.train(network, inputs, targets);
} catch (err) {
  console.error(`[train] failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

show();

if (writeDot) {
  fs.writeFileSync("network.dot", new Graph().draw(network));
  console.log("[graph] wrote network.dot");
}
