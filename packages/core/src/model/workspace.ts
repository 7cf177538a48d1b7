import { Model } from './model.js';

export class Workspace {
  name: string;
  description: string;
  readonly model = new Model();

  constructor(name: string, description = '') {
    this.name = name;
    this.description = description;
  }
}
