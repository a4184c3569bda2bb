import type { GenerateInput } from '@services/chain/chain.js';

import type { Classifier } from './classifier.js';
import type { Dispatcher } from './dispatcher.js';

export interface RouteResult<L extends string, Res> {
  label: L;
  response: Res;
}

export class Router<L extends string, Req extends GenerateInput, Res> {
  constructor(
    private readonly classifier: Classifier<L>,
    private readonly dispatcher: Dispatcher<L, Req, Res>,
  ) {}

  async route(request: Req): Promise<RouteResult<L, Res>> {
    const label = await this.classifier.classify(request);
    const response = await this.dispatcher.dispatch(label, request);
    return { label, response };
  }
}
