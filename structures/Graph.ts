import {
  Digraph,
  Node,
  Edge,
  toDot,
} from "ts-graphviz";
import { Network } from "./Network";

export class Graph {
  build(network: Network): Digraph {
    const graph = new Digraph();
    const input = new Node("input", { label: `input | ${network.inputWidth}`, shape: "record" });
    graph.addNode(input);

    let previous = input;
    for (let i = 0; i < network.size; i++) {
      const layer = network.layerAt(i);
      const node = new Node(`layer${i}`, {
        label: `${layer.kind} | ${layer.inputWidth} → ${layer.outputWidth}`,
        shape: "record",
      });
      graph.addNode(node);
      graph.addEdge(new Edge([previous, node]));
      previous = node;
    }

    const output = new Node("output", { label: `output | ${network.outputWidth}`, shape: "record" });
    graph.addNode(output);
    graph.addEdge(new Edge([previous, output]));
    return graph;
  }

  draw(network: Network): string {
    // paste into https://viz-js.com/
    return toDot(this.build(network));
  }
}
