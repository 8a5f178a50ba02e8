// Content plan as received from the frontend, after normalisation: blank strings and
// JSON nulls are dropped, so every optional field is either populated or undefined.

export interface Scene {
  scene_number?: number;
  /** Seconds. */
  duration?: number;
  subtitle?: string;
  narration?: string;
  visual_description?: string;
}

export interface ContentPlan {
  title?: string;
  topic: string;
  /** Seconds. */
  duration?: number;
  key_message?: string;
  scenes: Scene[];
  conclusion?: string;
}

export interface CreateDocumentRequest {
  content_plan: ContentPlan;
  user_email: string;
}
