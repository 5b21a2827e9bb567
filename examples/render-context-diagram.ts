/**
 * Context Diagram Demo
 *
 * Lays out a small context diagram (one system, two actors, labelled ports)
 * and prints the scene tree.
 *
 * Run: npm run example
 * Other transports: LAYOUT_TRANSPORT=persistent-process npm run example
 */

import 'dotenv/config';
import { GraphLayoutClient } from '../src/layout/graph-layout-client.js';
import {
  LABEL_LAYOUT_OPTIONS,
  PortLabelPosition,
  getGlobalLayeredLayoutOptions,
  portLabelLayoutOptions,
} from '../src/layout/layout-options.js';
import { validateConfig } from '../src/shared/config.js';
import type { AbstractGraph } from '../src/shared/types/elk-graph.js';
import type { SceneElement } from '../src/shared/types/scene.js';

const graph: AbstractGraph = {
  id: 'context',
  layoutOptions: getGlobalLayeredLayoutOptions(),
  children: [
    {
      id: 'operator',
      width: 120,
      height: 60,
      labels: [{ text: 'Operator', width: 60, height: 16 }],
      layoutOptions: { ...LABEL_LAYOUT_OPTIONS },
    },
    {
      id: 'controller',
      width: 160,
      height: 80,
      labels: [{ text: 'Flight Controller', width: 110, height: 16 }],
      ports: [
        { id: 'controller-in', width: 10, height: 10, labels: [{ text: 'cmd', width: 24, height: 12 }] },
        { id: 'controller-out', width: 10, height: 10, labels: [{ text: 'telemetry', width: 60, height: 12 }] },
      ],
      layoutOptions: portLabelLayoutOptions(PortLabelPosition.OUTSIDE),
    },
    {
      id: 'ground-station',
      width: 140,
      height: 60,
      labels: [{ text: 'Ground Station', width: 96, height: 16 }],
    },
  ],
  edges: [
    {
      id: 'commands',
      source: 'operator',
      target: 'controller',
      targetPort: 'controller-in',
      labels: [{ text: 'commands', width: 60, height: 12 }],
    },
    {
      id: 'downlink',
      source: 'controller',
      sourcePort: 'controller-out',
      target: 'ground-station',
      labels: [{ text: 'downlink', width: 56, height: 12 }],
    },
  ],
};

function printElement(element: SceneElement, depth: number): void {
  const indent = '  '.repeat(depth);
  switch (element.type) {
    case 'graph':
      console.log(`${indent}graph ${element.id}`);
      break;
    case 'node':
    case 'port':
      console.log(
        `${indent}${element.type} ${element.id} @ (${element.position.x}, ${element.position.y}) ${element.size.width}x${element.size.height}`
      );
      break;
    case 'label':
      console.log(`${indent}label ${element.id} "${element.text}"`);
      break;
    case 'edge': {
      const route = element.routingPoints.map((p) => `(${p.x}, ${p.y})`).join(' -> ');
      console.log(`${indent}edge ${element.id} ${element.sourceId} -> ${element.targetId}: ${route}`);
      break;
    }
    case 'junction':
      console.log(`${indent}junction ${element.id} @ (${element.position.x}, ${element.position.y})`);
      return;
  }

  if ('children' in element) {
    for (const child of element.children) {
      printElement(child, depth + 1);
    }
  }
}

async function main(): Promise<void> {
  const validation = validateConfig();
  if (!validation.valid) {
    console.error('❌ Invalid configuration:');
    validation.errors.forEach((error) => console.error(`   ${error}`));
    process.exit(1);
  }

  const client = GraphLayoutClient.fromConfig();
  console.log('='.repeat(70));
  console.log(`Context diagram via ${client.transportKind}`);
  console.log('='.repeat(70));

  try {
    const scene = await client.render(graph);
    printElement(scene, 0);
  } finally {
    await client.close();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Demo failed:', error);
  process.exit(1);
});
