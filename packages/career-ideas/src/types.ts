/** One suggestion as returned by the model, after normalization. Field names follow the JSON the model is asked for. */
export interface CareerIdea {
  title: string;
  why_fit: string;
  starter_steps: string[];
  skills_to_learn: string[];
  local_or_free_resources: string[];
  related_roles: string[];
  salary_hint: string;
}

export interface CareerSessionState {
  ideas: CareerIdea[];
}
